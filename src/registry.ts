// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2023-Present The Kubernetes Fluent Client Authors

import { Definition, Ref, SchemaObject, refOf } from "./model.js";

/** Resolves references to the objects they name, keyed by {@link refKey}. */
export type RefObjects = ReadonlyMap<string, SchemaObject>;

export function refKey(ref: Ref): string {
  return `${ref.package}#${ref.name}`;
}

/**
 * Builds the registry for a set of definitions. Nested types are registered under their
 * qualified name.
 *
 * @param definitions - Every definition taking part in the generation.
 * @returns The registry.
 */
export function buildRefObjects(definitions: Definition[]): RefObjects {
  const refObjects = new Map<string, SchemaObject>();

  const register = (o: SchemaObject) => {
    refObjects.set(refKey(refOf(o)), o);
    o.nestedTypes.forEach(register);
  };

  for (const definition of definitions) {
    if (definition.kind === "object") {
      register(definition);
    }
  }

  return refObjects;
}

/**
 * Checks whether a reference names an object carrying the Kubernetes object capability.
 * Unknown references are not Kubernetes objects.
 *
 * @param refObjects - The registry.
 * @param ref - The reference to check.
 * @returns True if the reference resolves to a Kubernetes object.
 */
export function isKubernetesObject(refObjects: RefObjects, ref: Ref): boolean {
  return refObjects.get(refKey(ref))?.isKubernetesObject ?? false;
}
