// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2023-Present The Kubernetes Fluent Client Authors

/** The primitive schema types. Integer and number both render as `number`. */
export type PrimitiveKind = "boolean" | "integer" | "number" | "string";

/** A reference to another definition, possibly in a different package. */
export interface Ref {
  kind: "ref";
  package: string;
  name: string;
}

/** The closed set of schema types. */
export type Type =
  | { kind: "empty" }
  | { kind: "primitive"; primitive: PrimitiveKind }
  | Ref
  | { kind: "array"; items: Type }
  | { kind: "map"; values: Type };

/** A field of an object. */
export interface Property {
  type: Type;
  required: boolean;
  description: string;
}

export interface NamedProperty extends Property {
  name: string;
}

/** The Group/Version/Kind identity of a resource. */
export interface GroupVersionKind {
  group: string;
  version: string;
  kind: string;
}

/** A schema object, rendered as a class. */
export interface SchemaObject {
  kind: "object";
  name: string;
  package: string;
  /** Names of the enclosing objects, outermost first. Empty for top-level objects. */
  namespace: string[];
  description: string;
  /** Insertion order is the rendering order. */
  properties: ReadonlyMap<string, Property>;
  /** Owned by this object and rendered inside its namespace. */
  nestedTypes: SchemaObject[];
  groupVersionKinds: GroupVersionKind[];
  isKubernetesObject: boolean;
}

/** A schema alias, rendered as a type alias. */
export interface Alias {
  kind: "alias";
  name: string;
  package: string;
  description: string;
  type: Type;
}

export type Definition = SchemaObject | Alias;

export interface Meta {
  package: string;
  name: string;
}

/**
 * Fails on a value a closed union should not be able to hold.
 *
 * @param value - The value the switch fell through with.
 * @param what - The name of the union, used in the error message.
 * @throws Always.
 */
export function assertNever(value: never, what: string): never {
  throw new Error(`unknown ${what}: ${JSON.stringify(value)}`);
}

/**
 * Creates a reference.
 *
 * @param pkg - The package of the referenced definition.
 * @param name - The name of the referenced definition.
 * @returns The reference.
 */
export function ref(pkg: string, name: string): Ref {
  return { kind: "ref", package: pkg, name };
}

/**
 * Returns the apiVersion of a GVK, which omits the group for the core group.
 *
 * @example
 * apiVersionOf({ group: "apps", version: "v1", kind: "Deployment" }); // "apps/v1"
 * apiVersionOf({ group: "", version: "v1", kind: "Pod" }); // "v1"
 *
 * @param gvk - The GVK.
 * @returns The apiVersion string.
 */
export function apiVersionOf(gvk: GroupVersionKind): string {
  return gvk.group === "" ? gvk.version : `${gvk.group}/${gvk.version}`;
}

/**
 * Returns the primary GVK of an object. Only the first one is ever used for rendering.
 *
 * @param o - The object.
 * @returns The first GVK, or undefined if the object has none.
 */
export function primaryGroupVersionKind(o: SchemaObject): GroupVersionKind | undefined {
  return o.groupVersionKinds[0];
}

/**
 * Lists the properties of an object in declaration order.
 *
 * @param o - The object.
 * @returns The named properties.
 */
export function namedProperties(o: SchemaObject): NamedProperty[] {
  return [...o.properties].map(([name, property]) => ({ name, ...property }));
}

export function hasRequiredFields(o: SchemaObject): boolean {
  return [...o.properties.values()].some(p => p.required);
}

export function metaOf(definition: Definition): Meta {
  return { package: definition.package, name: definition.name };
}

/**
 * Returns the reference other definitions use to point at this one. Nested objects are
 * qualified with their enclosing objects, e.g. `Pod.Status`.
 *
 * @param definition - The definition.
 * @returns The reference.
 */
export function refOf(definition: Definition): Ref {
  if (definition.kind === "object") {
    return ref(definition.package, [...definition.namespace, definition.name].join("."));
  }
  return ref(definition.package, definition.name);
}

/**
 * Collects the references a type depends on.
 *
 * @param type - The type to inspect.
 * @returns Every reference reachable without following references.
 */
export function typeRefs(type: Type): Ref[] {
  switch (type.kind) {
    case "empty":
    case "primitive":
      return [];
    case "ref":
      return [type];
    case "array":
      return typeRefs(type.items);
    case "map":
      return typeRefs(type.values);
    default:
      return assertNever(type, "Type");
  }
}

/**
 * Collects the references a definition depends on, including those of nested types.
 * Duplicates are kept.
 *
 * @param definition - The definition.
 * @returns The references, in property order.
 */
export function importsOf(definition: Definition): Ref[] {
  switch (definition.kind) {
    case "object":
      return [
        ...[...definition.properties.values()].flatMap(p => typeRefs(p.type)),
        ...definition.nestedTypes.flatMap(importsOf),
      ];
    case "alias":
      return typeRefs(definition.type);
    default:
      return assertNever(definition, "Definition");
  }
}
