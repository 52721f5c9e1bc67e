// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2023-Present The Kubernetes Fluent Client Authors

import { NamedProperty, Type, assertNever } from "../model.js";
import { RefObjects, isKubernetesObject } from "../registry.js";
import { packageAlias } from "./types.js";

/**
 * Builds the expression converting a raw descriptor value into the field's typed value.
 *
 * Only references to Kubernetes objects, and arrays of them, are constructed. Map values and
 * arrays of arrays are passed through as they are.
 *
 * @param refObjects - The registry deciding which references are Kubernetes objects.
 * @param currentPackage - The package of the enclosing object.
 * @param type - The type of the field.
 * @param field - The expression reading the raw value.
 * @returns The conversion expression.
 */
export function printConstructor(
  refObjects: RefObjects,
  currentPackage: string,
  type: Type,
  field: string,
): string {
  switch (type.kind) {
    case "empty":
    case "primitive":
      return field;
    case "ref":
      if (!isKubernetesObject(refObjects, type)) {
        return field;
      }
      if (type.package === currentPackage) {
        return `new ${type.name}(${field})`;
      }
      return `new ${packageAlias(type.package)}.${type.name}(${field})`;
    case "array":
      // TODO: construct arrays of Kubernetes objects nested inside arrays.
      if (type.items.kind === "ref" && isKubernetesObject(refObjects, type.items)) {
        const item = printConstructor(refObjects, currentPackage, type.items, "i");
        return `${field}.map((i) => ${item})`;
      }
      return field;
    case "map":
      // TODO: construct map values that are Kubernetes objects.
      return field;
    default:
      return assertNever(type, "Type");
  }
}

/**
 * Renders the constructor line assigning one property from the descriptor.
 *
 * @param refObjects - The registry deciding which references are Kubernetes objects.
 * @param currentPackage - The package of the enclosing object.
 * @param property - The property to assign.
 * @param override - An expression assigned instead of the descriptor value.
 * @returns The assignment, preceded by a newline.
 */
export function printConstructorField(
  refObjects: RefObjects,
  currentPackage: string,
  property: NamedProperty,
  override?: string,
): string {
  const value = override ?? printDescriptorValue(refObjects, currentPackage, property);
  return `\nthis.${property.name} = ${value};`;
}

function printDescriptorValue(
  refObjects: RefObjects,
  currentPackage: string,
  property: NamedProperty,
): string {
  const field = `desc.${property.name}`;
  const value = printConstructor(refObjects, currentPackage, property.type, field);

  const { type } = property;
  if (
    !property.required &&
    type.kind === "array" &&
    type.items.kind === "ref" &&
    isKubernetesObject(refObjects, type.items)
  ) {
    return `(${field} !== undefined) ? ${value} : undefined`;
  }
  return value;
}
