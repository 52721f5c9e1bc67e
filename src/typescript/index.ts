// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2023-Present The Kubernetes Fluent Client Authors

import { Definition, assertNever, metaOf } from "../model.js";
import { RefObjects } from "../registry.js";
import { printAlias } from "./aliases.js";
import { defaultRuntimePackage, printHeader } from "./header.js";
import { printObject } from "./objects.js";

export { printAlias } from "./aliases.js";
export { defaultRuntimePackage, importedPackages, printHeader } from "./header.js";
export { printInterface, printNamespace, printObject } from "./objects.js";
export { printConstructor, printConstructorField } from "./constructors.js";
export { printClassField, printInterfaceField } from "./fields.js";
export { indent, printDescription } from "./text.js";
export { packageAlias, tsType } from "./types.js";

/**
 * Renders definitions as TypeScript. Files are named after packages, so every definition
 * of a package lands in the same file.
 */
export class TypeScript {
  constructor(
    private readonly refObjects: RefObjects,
    private readonly runtimePackage: string = defaultRuntimePackage,
  ) {}

  /** The name of the file a definition is written to. */
  file(definition: Definition): string {
    return `${metaOf(definition).package}.ts`;
  }

  /** The import block for the definitions of one file. */
  printHeader(definitions: Definition[]): string {
    return printHeader(this.refObjects, definitions, this.runtimePackage);
  }

  /** The full declaration of one definition. */
  printDefinition(definition: Definition): string {
    switch (definition.kind) {
      case "object":
        return printObject(this.refObjects, definition);
      case "alias":
        return printAlias(definition);
      default:
        return assertNever(definition, "Definition");
    }
  }
}
