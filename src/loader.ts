// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2023-Present The Kubernetes Fluent Client Authors

import { loadAll } from "js-yaml";

import {
  Alias,
  Definition,
  GroupVersionKind,
  PrimitiveKind,
  Property,
  SchemaObject,
  Type,
  ref,
} from "./model.js";

type Doc = Record<string, unknown>;

const primitives: PrimitiveKind[] = ["boolean", "integer", "number", "string"];

function isDoc(value: unknown): value is Doc {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPrimitive(value: string): value is PrimitiveKind {
  return primitives.some(p => p === value);
}

function expectDoc(value: unknown, path: string): Doc {
  if (!isDoc(value)) {
    throw new Error(`${path} must be a mapping`);
  }
  return value;
}

function expectList(value: unknown, path: string): unknown[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new Error(`${path} must be a list`);
  }
  return value;
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== "string") {
    throw new Error(`${path} must be a string`);
  }
  return value;
}

function optionalString(value: unknown, path: string): string {
  return value === undefined ? "" : expectString(value, path);
}

function optionalBoolean(value: unknown, path: string): boolean {
  if (value === undefined) {
    return false;
  }
  if (typeof value !== "boolean") {
    throw new Error(`${path} must be a boolean`);
  }
  return value;
}

/**
 * Reads a type. Strings name primitives (`object` is the untyped type), mappings hold
 * exactly one of `ref`, `array` or `map`.
 *
 * @param value - The raw value.
 * @param pkg - The package references without an explicit package point into.
 * @param path - Where the value sits in the document, for error messages.
 * @returns The type.
 */
export function readType(value: unknown, pkg: string, path: string): Type {
  if (typeof value === "string") {
    if (value === "object") {
      return { kind: "empty" };
    }
    if (isPrimitive(value)) {
      return { kind: "primitive", primitive: value };
    }
    throw new Error(`${path} has unknown type "${value}"`);
  }

  const doc = expectDoc(value, path);
  if (doc.ref !== undefined) {
    const target = doc.package === undefined ? pkg : expectString(doc.package, `${path}.package`);
    return ref(target, expectString(doc.ref, `${path}.ref`));
  }
  if (doc.array !== undefined) {
    return { kind: "array", items: readType(doc.array, pkg, `${path}.array`) };
  }
  if (doc.map !== undefined) {
    return { kind: "map", values: readType(doc.map, pkg, `${path}.map`) };
  }
  throw new Error(`${path} must have one of ref, array or map`);
}

function readProperty(value: unknown, pkg: string, path: string): Property {
  const doc = expectDoc(value, path);
  return {
    type: readType(doc.type, pkg, `${path}.type`),
    required: optionalBoolean(doc.required, `${path}.required`),
    description: optionalString(doc.description, `${path}.description`),
  };
}

function readGroupVersionKind(value: unknown, path: string): GroupVersionKind {
  const doc = expectDoc(value, path);
  return {
    group: optionalString(doc.group, `${path}.group`),
    version: expectString(doc.version, `${path}.version`),
    kind: expectString(doc.kind, `${path}.kind`),
  };
}

/**
 * Reads the properties of an object. A list of entries carrying a `name` keeps the order of
 * the document exactly. A mapping is read in object key order, which puts integer-like keys
 * such as `"2"` first.
 *
 * @param value - The raw `properties` value.
 * @param pkg - The package of the enclosing object.
 * @param path - Where the value sits in the document, for error messages.
 * @returns The properties, keyed by name.
 */
function readProperties(value: unknown, pkg: string, path: string): Map<string, Property> {
  const properties = new Map<string, Property>();
  if (value === undefined) {
    return properties;
  }

  if (Array.isArray(value)) {
    value.forEach((raw: unknown, i) => {
      const entryPath = `${path}[${i}]`;
      const name = expectString(expectDoc(raw, entryPath).name, `${entryPath}.name`);
      properties.set(name, readProperty(raw, pkg, entryPath));
    });
    return properties;
  }

  for (const [key, raw] of Object.entries(expectDoc(value, path))) {
    properties.set(key, readProperty(raw, pkg, `${path}.${key}`));
  }
  return properties;
}

function readObject(doc: Doc, pkg: string, namespace: string[], path: string): SchemaObject {
  const name = expectString(doc.name, `${path}.name`);
  const properties = readProperties(doc.properties, pkg, `${path}.properties`);

  const nestedNamespace = [...namespace, name];
  const nestedTypes = expectList(doc.nestedTypes, `${path}.nestedTypes`).map((value, i) => {
    const nestedPath = `${path}.nestedTypes[${i}]`;
    return readObject(expectDoc(value, nestedPath), pkg, nestedNamespace, nestedPath);
  });

  return {
    kind: "object",
    name,
    package: pkg,
    namespace,
    description: optionalString(doc.description, `${path}.description`),
    properties,
    nestedTypes,
    groupVersionKinds: expectList(doc.groupVersionKinds, `${path}.groupVersionKinds`).map(
      (value, i) => readGroupVersionKind(value, `${path}.groupVersionKinds[${i}]`),
    ),
    isKubernetesObject: optionalBoolean(doc.kubernetesObject, `${path}.kubernetesObject`),
  };
}

function readAlias(doc: Doc, pkg: string, path: string): Alias {
  return {
    kind: "alias",
    name: expectString(doc.name, `${path}.name`),
    package: pkg,
    description: optionalString(doc.description, `${path}.description`),
    type: readType(doc.alias, pkg, `${path}.alias`),
  };
}

/**
 * Reads the definitions of one model document. A definition with an `alias` key is an
 * alias, anything else is an object.
 *
 * @param value - The parsed document.
 * @param path - Where the document comes from, for error messages.
 * @returns The definitions, in document order.
 */
export function readModelDocument(value: unknown, path: string): Definition[] {
  const doc = expectDoc(value, path);
  const pkg = expectString(doc.package, `${path}.package`);

  return expectList(doc.definitions, `${path}.definitions`).map((raw, i) => {
    const defPath = `${path}.definitions[${i}]`;
    const def = expectDoc(raw, defPath);
    return def.alias === undefined
      ? readObject(def, pkg, [], defPath)
      : readAlias(def, pkg, defPath);
  });
}

/**
 * Parses YAML or JSON model documents. Empty documents are skipped.
 *
 * @param content - The file content, possibly holding several YAML documents.
 * @returns The definitions of every document.
 */
export function loadModel(content: string): Definition[] {
  const docs: unknown[] = loadAll(content);
  return docs
    .filter(doc => doc !== null && doc !== undefined)
    .flatMap((doc, i) => readModelDocument(doc, `document[${i}]`));
}
