#!/usr/bin/env node

// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2023-Present The Kubernetes Fluent Client Authors

import * as fs from "fs";
import { hideBin } from "yargs/helpers";
import yargs from "yargs/yargs";
import { GenerateOptions, generate } from "./generate.js";
import { defaultRuntimePackage } from "./typescript/index.js";

/**
 * Reads the version of this package from its package.json.
 *
 * @returns The version, or "unknown" if it cannot be found.
 */
function packageVersion(): string {
  const pkg: unknown = JSON.parse(
    fs.readFileSync(new URL("../package.json", import.meta.url), "utf8"),
  );
  if (
    typeof pkg === "object" &&
    pkg !== null &&
    "version" in pkg &&
    typeof pkg.version === "string"
  ) {
    return pkg.version;
  }
  return "unknown";
}

void yargs(hideBin(process.argv))
  .version("version", "Display version number", `k8s-schema-codegen v${packageVersion()}`)
  .alias("version", "V")
  .command(
    "ts [source] [directory]",
    "generate TypeScript classes from a schema model file",
    yargs => {
      return yargs
        .positional("source", {
          describe: "the yaml or json model file path",
          type: "string",
        })
        .positional("directory", {
          describe: "the directory to output the generated files to",
          type: "string",
        })
        .option("runtime-package", {
          alias: "r",
          type: "string",
          default: defaultRuntimePackage,
          description: "the package the KubernetesObject interface is imported from",
        })
        .demandOption(["source", "directory"]);
    },
    argv => {
      const opts: GenerateOptions = {
        source: argv.source,
        directory: argv.directory,
        runtimePackage: argv.runtimePackage,
        logFn: console.log,
      };

      try {
        generate(opts);
      } catch (e) {
        console.log(`\n❌ ${e instanceof Error ? e.message : String(e)}`);
        process.exitCode = 1;
      }
    },
  )
  .demandCommand(1)
  .strict()
  .parse();
