// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2023-Present The Kubernetes Fluent Client Authors

import { PrimitiveKind, Type, assertNever } from "../model.js";

/**
 * Upper-cases the first letter of every word, where words are separated by anything other
 * than letters, digits and underscores.
 *
 * @param s - The string to title-case.
 * @returns The title-cased string.
 */
function title(s: string): string {
  return s.replace(
    /(^|[^\p{L}\p{N}_])(\p{Ll})/gu,
    (_, sep: string, c: string) => sep + c.toUpperCase(),
  );
}

/**
 * Computes the import alias of a package from its last three segments.
 *
 * Packages are assumed to have at least three segments; shorter ones use all of them. Two
 * packages that share their last three segments get the same alias.
 *
 * @example
 * packageAlias("io.k8s.apimachinery.pkg.apis.meta.v1"); // "apisMetaV1"
 *
 * @param pkg - The dotted package name.
 * @returns The alias.
 */
export function packageAlias(pkg: string): string {
  return pkg
    .split(".")
    .slice(-3)
    .map((split, i) => (i === 0 ? split : title(split)))
    .join("");
}

function tsPrimitive(primitive: PrimitiveKind): string {
  switch (primitive) {
    case "boolean":
      return "boolean";
    case "integer":
    case "number":
      return "number";
    case "string":
      return "string";
    default:
      return assertNever(primitive, "Primitive");
  }
}

/**
 * Renders a schema type as a TypeScript type expression.
 *
 * @param currentPackage - The package of the file the type is rendered into.
 * @param type - The type to render.
 * @returns The type expression.
 */
export function tsType(currentPackage: string, type: Type): string {
  switch (type.kind) {
    case "empty":
      return "object";
    case "primitive":
      return tsPrimitive(type.primitive);
    case "ref":
      if (type.package === currentPackage) {
        return type.name;
      }
      return `${packageAlias(type.package)}.${type.name}`;
    case "array":
      return `${tsType(currentPackage, type.items)}[]`;
    case "map":
      return `{[key: string]: ${tsType(currentPackage, type.values)}}`;
    default:
      return assertNever(type, "Type");
  }
}
