// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2023-Present The Kubernetes Fluent Client Authors

import {
  NamedProperty,
  SchemaObject,
  apiVersionOf,
  hasRequiredFields,
  namedProperties,
  primaryGroupVersionKind,
} from "../model.js";
import { RefObjects } from "../registry.js";
import { printConstructorField } from "./constructors.js";
import { printClassField, printInterfaceField } from "./fields.js";
import { indent, printDescription } from "./text.js";

// Properties every object with a GVK fills in itself.
const identityProperties = ["apiVersion", "kind"];

/**
 * Returns the expression assigned to a property instead of the descriptor value, if any.
 *
 * @param o - The enclosing object.
 * @param property - The property.
 * @returns `Name.apiVersion` or `Name.kind` for objects with a GVK, otherwise undefined.
 */
function overrideFor(o: SchemaObject, property: NamedProperty): string | undefined {
  if (o.groupVersionKinds.length > 0 && identityProperties.includes(property.name)) {
    return `${o.name}.${property.name}`;
  }
  return undefined;
}

/**
 * Renders an object as a class followed by its type guard and companion namespace.
 *
 * @param refObjects - The registry deciding which references are Kubernetes objects.
 * @param o - The object.
 * @returns The TypeScript source.
 */
export function printObject(refObjects: RefObjects, o: SchemaObject): string {
  const properties = namedProperties(o);

  const fields = properties.map(property => printClassField(o.package, property));
  const constructors = properties.map(property =>
    indent(printConstructorField(refObjects, o.package, property, overrideFor(o, property))),
  );

  let descType = [...o.namespace, o.name].join(".");
  if (o.isKubernetesObject) {
    descType = `${descType}.Interface`;
  }

  let constructor = "";
  if (hasRequiredFields(o)) {
    // Always "" inside this branch.
    const optionalDesc = hasRequiredFields(o) ? "" : "?";
    constructor = indent(
      `\n\nconstructor(desc${optionalDesc}: ${descType}) {${constructors.join("")}\n}`,
    );
  }

  let isType = "";
  if (primaryGroupVersionKind(o)) {
    isType = `

export function is${o.name}(o: any): o is ${o.name} {
  return o && o.apiVersion === ${o.name}.apiVersion && o.kind === ${o.name}.kind;
}`;
  }

  const implementsClause = o.isKubernetesObject ? " implements KubernetesObject" : "";

  return `${printDescription(o.description)}export class ${o.name}${implementsClause} {
${indent(fields.join("\n\n"))}${constructor}
}${isType}${printNamespace(refObjects, o)}`;
}

/**
 * Renders the companion namespace of an object: GVK constants, the `named` factory, the
 * structural interface and the nested classes, in that order.
 *
 * @param refObjects - The registry deciding which references are Kubernetes objects.
 * @param o - The object.
 * @returns The namespace, preceded by a blank line, or an empty string if there is nothing
 * to put in it.
 */
export function printNamespace(refObjects: RefObjects, o: SchemaObject): string {
  const gvk = primaryGroupVersionKind(o);
  if (o.nestedTypes.length === 0 && !o.isKubernetesObject && !gvk) {
    return "";
  }

  const classes: string[] = [];
  if (gvk) {
    classes.push(indent(printInterface(o)));
  }

  const nestedTypes = [...o.nestedTypes].sort((a, b) => compareNames(a.name, b.name));
  for (const nested of nestedTypes) {
    classes.push(indent(printObject(refObjects, nested)));
  }

  let constants = "";
  if (gvk) {
    constants = indent(`export const apiVersion = ${JSON.stringify(apiVersionOf(gvk))};
export const group = ${JSON.stringify(gvk.group)};
export const version = ${JSON.stringify(gvk.version)};
export const kind = ${JSON.stringify(gvk.kind)};

`);
  }

  let namedFunc = "";
  if (o.isKubernetesObject && onlyMetadataRequired(o)) {
    namedFunc = indent(`// named constructs a ${o.name} with metadata.name set to name.
export function named(name: string): ${o.name} {
  return new ${o.name}({metadata: {name}});
}
`);
  }

  return `

export namespace ${o.name} {
${constants}${namedFunc}${classes.join("\n")}
}`;
}

/**
 * Renders the structural interface of an object with a GVK. `apiVersion` and `kind` are
 * left out since the class supplies them.
 *
 * @param o - The object.
 * @returns The interface declaration.
 */
export function printInterface(o: SchemaObject): string {
  const hasGvk = primaryGroupVersionKind(o) !== undefined;
  const properties = namedProperties(o)
    .filter(property => !(hasGvk && identityProperties.includes(property.name)))
    .map(property => printInterfaceField(o.package, property));

  return `${printDescription(o.description)}export interface Interface {
${indent(properties.join("\n\n"))}
}`;
}

/**
 * Checks that a name is all it takes to satisfy the required fields of an object.
 *
 * @param o - The object.
 * @returns True if no property other than metadata, apiVersion and kind is required.
 */
export function onlyMetadataRequired(o: SchemaObject): boolean {
  return namedProperties(o).every(
    p => !p.required || p.name === "metadata" || identityProperties.includes(p.name),
  );
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
