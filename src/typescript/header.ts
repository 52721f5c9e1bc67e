// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2023-Present The Kubernetes Fluent Client Authors

import { Definition, importsOf, metaOf, refOf } from "../model.js";
import { RefObjects, isKubernetesObject } from "../registry.js";
import { packageAlias } from "./types.js";

/** The package the `KubernetesObject` interface is imported from by default. */
export const defaultRuntimePackage = "@kubernetes/client-node";

/**
 * Lists the packages a batch of definitions imports from, other than its own.
 *
 * @param currentPackage - The package of the batch.
 * @param definitions - The definitions.
 * @returns The distinct packages, sorted.
 */
export function importedPackages(currentPackage: string, definitions: Definition[]): string[] {
  const packages = new Set<string>();
  for (const ref of definitions.flatMap(importsOf)) {
    if (ref.package !== currentPackage) {
      packages.add(ref.package);
    }
  }
  return [...packages].sort();
}

/**
 * Renders the import block of a file holding the given definitions. All definitions are
 * expected to share the package of the first one.
 *
 * @param refObjects - The registry deciding which definitions are Kubernetes objects.
 * @param definitions - The definitions of one file.
 * @param runtimePackage - The package providing the `KubernetesObject` interface.
 * @returns The import lines, or an empty string for an empty batch.
 */
export function printHeader(
  refObjects: RefObjects,
  definitions: Definition[],
  runtimePackage: string = defaultRuntimePackage,
): string {
  if (definitions.length === 0) {
    return "";
  }
  const currentPackage = metaOf(definitions[0]).package;

  const result: string[] = [];

  // KubernetesObject is only needed when the file declares a Kubernetes object.
  if (definitions.some(definition => isKubernetesObject(refObjects, refOf(definition)))) {
    result.push(`import { KubernetesObject } from '${runtimePackage}';`);
  }

  for (const pkg of importedPackages(currentPackage, definitions)) {
    result.push(`import * as ${packageAlias(pkg)} from './${pkg}';`);
  }

  return result.join("\n");
}
