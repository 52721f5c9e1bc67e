// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2023-Present The Kubernetes Fluent Client Authors

import * as fs from "fs";
import * as path from "path";

import { loadModel } from "./loader.js";
import { Definition } from "./model.js";
import { buildRefObjects } from "./registry.js";
import { LogFn } from "./types.js";
import { TypeScript } from "./typescript/index.js";

export interface GenerateOptions {
  /** The model file path, YAML or JSON */
  source: string;
  /** The output directory path, nothing is written when omitted */
  directory?: string;
  /** Override the package the KubernetesObject interface is imported from */
  runtimePackage?: string;
  /** Log function callback */
  logFn: LogFn;
}

/**
 * Groups definitions by the file they are written to. Files and the definitions within them
 * are sorted by name so the output does not depend on input order.
 *
 * @param language - The language deciding the file names.
 * @param definitions - The definitions to group.
 * @returns The definitions of each file, keyed by file name.
 */
export function groupByFile(
  language: TypeScript,
  definitions: Definition[],
): Map<string, Definition[]> {
  const files = new Map<string, Definition[]>();

  const sorted = [...definitions].sort((a, b) => compare(a.name, b.name));
  for (const definition of sorted) {
    const fileName = language.file(definition);
    files.set(fileName, [...(files.get(fileName) ?? []), definition]);
  }

  return new Map([...files].sort(([a], [b]) => compare(a, b)));
}

/**
 * Renders the content of one file: the import block followed by every definition, separated
 * by blank lines.
 *
 * @param language - The language to render with.
 * @param definitions - The definitions of the file, all in one package.
 * @returns The file content, ending in a newline.
 */
export function renderFile(language: TypeScript, definitions: Definition[]): string {
  const parts = [
    language.printHeader(definitions),
    ...definitions.map(definition => language.printDefinition(definition)),
  ].filter(part => part !== "");

  return `${parts.join("\n\n")}\n`;
}

/**
 * Writes the content of a generated file.
 *
 * @param fileName - The name of the file to write.
 * @param directory - The directory where the file will be written.
 * @param content - The content to write to the file.
 */
export function writeGeneratedFile(fileName: string, directory: string, content: string): void {
  if (!directory) return;

  const filePath = path.join(directory, fileName);
  fs.mkdirSync(directory, { recursive: true });
  fs.writeFileSync(filePath, content);
}

/**
 * Resolves the source file path, treating relative paths as relative to the working directory.
 *
 * @param source - The source path to resolve.
 * @returns The resolved file path.
 */
export function resolveFilePath(source: string): string {
  return source.startsWith("/") ? source : path.join(process.cwd(), source);
}

/**
 * Reads the model definitions from the source file.
 *
 * @param opts - The options for generating the TypeScript sources.
 * @returns The definitions.
 */
export function readModel(opts: GenerateOptions): Definition[] {
  const filePath = resolveFilePath(opts.source);

  if (!fs.existsSync(filePath)) {
    throw new Error(`Failed to read ${opts.source} as a model file`);
  }

  opts.logFn(`Loading ${opts.source}`);
  return loadModel(fs.readFileSync(filePath, "utf8"));
}

/**
 * Generates one TypeScript file per package of the model.
 *
 * @param opts - The options for generating the TypeScript sources.
 * @returns The generated content, keyed by file name.
 */
export function generate(opts: GenerateOptions): Record<string, string> {
  const definitions = readModel(opts);
  const language = new TypeScript(buildRefObjects(definitions), opts.runtimePackage);
  const results: Record<string, string> = {};

  opts.logFn("");

  for (const [fileName, batch] of groupByFile(language, definitions)) {
    opts.logFn(`- Generating ${fileName} with ${batch.length} definitions`);

    const content = renderFile(language, batch);
    writeGeneratedFile(fileName, opts.directory || "", content);

    results[fileName] = content;
  }

  if (opts.directory) {
    opts.logFn(
      `\n✅ Generated ${Object.keys(results).length} files in the ${opts.directory} directory`,
    );
  }

  return results;
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
