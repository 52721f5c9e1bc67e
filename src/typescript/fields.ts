// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2023-Present The Kubernetes Fluent Client Authors

import { NamedProperty } from "../model.js";
import { printDescription } from "./text.js";
import { tsType } from "./types.js";

function optionalMarker(property: NamedProperty): string {
  return property.required ? "" : "?";
}

/**
 * Renders a property as a public class field.
 *
 * @param currentPackage - The package of the enclosing object.
 * @param property - The property.
 * @returns The field declaration, preceded by its description.
 */
export function printClassField(currentPackage: string, property: NamedProperty): string {
  const type = tsType(currentPackage, property.type);
  const description = printDescription(property.description);
  return `${description}public ${property.name}${optionalMarker(property)}: ${type};`;
}

/**
 * Renders a property as an interface member.
 *
 * @param currentPackage - The package of the enclosing object.
 * @param property - The property.
 * @returns The member declaration, preceded by its description.
 */
export function printInterfaceField(currentPackage: string, property: NamedProperty): string {
  const type = tsType(currentPackage, property.type);
  const description = printDescription(property.description);
  return `${description}${property.name}${optionalMarker(property)}: ${type};`;
}
