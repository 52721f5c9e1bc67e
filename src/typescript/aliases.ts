// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2023-Present The Kubernetes Fluent Client Authors

import { Alias } from "../model.js";
import { printDescription } from "./text.js";
import { tsType } from "./types.js";

export function printAlias(a: Alias): string {
  return `${printDescription(a.description)}export type ${a.name} = ${tsType(a.package, a.type)};`;
}
