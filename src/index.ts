// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2023-Present The Kubernetes Fluent Client Authors

// Export the schema model
export * from "./model.js";

// Export the reference registry
export { buildRefObjects, isKubernetesObject, refKey } from "./registry.js";
export type { RefObjects } from "./registry.js";

// Export the TypeScript renderer
export * from "./typescript/index.js";

// Export the model loader and the file generator
export { loadModel, readModelDocument, readType } from "./loader.js";
export { generate, groupByFile, renderFile, writeGeneratedFile } from "./generate.js";
export type { GenerateOptions } from "./generate.js";

export type { LogFn } from "./types.js";
