// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2023-Present The Kubernetes Fluent Client Authors

/**
 * Indents every non-empty line by two spaces.
 *
 * @param text - The text to indent.
 * @returns The indented text.
 */
export function indent(text: string): string {
  return text
    .split("\n")
    .map(line => (line === "" ? line : `  ${line}`))
    .join("\n");
}

/**
 * Formats a description as line comments, one per line of the description.
 *
 * @param description - The description, possibly empty.
 * @returns The comment lines, each ending in a newline, or an empty string.
 */
export function printDescription(description: string): string {
  if (description === "") {
    return "";
  }
  return description
    .split("\n")
    .map(part => `// ${part}\n`)
    .join("");
}
