// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2023-Present The Kubernetes Fluent Client Authors

import { beforeEach, describe, expect, it, vi } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { GenerateOptions, generate, groupByFile, renderFile } from "./generate.js";
import { Alias, SchemaObject } from "./model.js";
import { buildRefObjects } from "./registry.js";
import { TypeScript } from "./typescript/index.js";

// Mock the fs module
vi.mock("fs", () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
  writeFileSync: vi.fn(),
  mkdirSync: vi.fn(),
  default: {
    existsSync: vi.fn(),
    readFileSync: vi.fn(),
    writeFileSync: vi.fn(),
    mkdirSync: vi.fn(),
  },
}));

const model = `
package: io.k8s.api.core.v1
definitions:
  - name: Pod
    kubernetesObject: true
    groupVersionKinds: [{ group: "", version: v1, kind: Pod }]
    properties:
      metadata:
        type: { ref: ObjectMeta, package: io.k8s.apimachinery.pkg.apis.meta.v1 }
        required: true
---
package: io.k8s.apimachinery.pkg.apis.meta.v1
definitions:
  - name: ObjectMeta
    properties:
      name: { type: string }
`;

const podFile = [
  "import { KubernetesObject } from '@kubernetes/client-node';",
  "import * as apisMetaV1 from './io.k8s.apimachinery.pkg.apis.meta.v1';",
  "",
  "export class Pod implements KubernetesObject {",
  "  public metadata: apisMetaV1.ObjectMeta;",
  "",
  "  constructor(desc: Pod.Interface) {",
  "    this.metadata = desc.metadata;",
  "  }",
  "}",
  "",
  "export function isPod(o: any): o is Pod {",
  "  return o && o.apiVersion === Pod.apiVersion && o.kind === Pod.kind;",
  "}",
  "",
  "export namespace Pod {",
  '  export const apiVersion = "v1";',
  '  export const group = "";',
  '  export const version = "v1";',
  '  export const kind = "Pod";',
  "",
  "  // named constructs a Pod with metadata.name set to name.",
  "  export function named(name: string): Pod {",
  "    return new Pod({metadata: {name}});",
  "  }",
  "  export interface Interface {",
  "    metadata: apisMetaV1.ObjectMeta;",
  "  }",
  "}",
  "",
].join("\n");

const metaFile = ["export class ObjectMeta {", "  public name?: string;", "}", ""].join("\n");

describe("generate", () => {
  const mockOpts: GenerateOptions = {
    source: "/models/core.yaml",
    directory: "out",
    logFn: vi.fn(),
  };

  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue(model);
  });

  it("should render one file per package", () => {
    const results = generate(mockOpts);

    expect(Object.keys(results)).toEqual([
      "io.k8s.api.core.v1.ts",
      "io.k8s.apimachinery.pkg.apis.meta.v1.ts",
    ]);
    expect(results["io.k8s.api.core.v1.ts"]).toBe(podFile);
    expect(results["io.k8s.apimachinery.pkg.apis.meta.v1.ts"]).toBe(metaFile);
  });

  it("should write the files to the directory", () => {
    generate(mockOpts);

    expect(fs.readFileSync).toHaveBeenCalledWith("/models/core.yaml", "utf8");
    expect(fs.mkdirSync).toHaveBeenCalledWith("out", { recursive: true });
    expect(fs.writeFileSync).toHaveBeenCalledWith(
      path.join("out", "io.k8s.api.core.v1.ts"),
      podFile,
    );
    expect(fs.writeFileSync).toHaveBeenCalledWith(
      path.join("out", "io.k8s.apimachinery.pkg.apis.meta.v1.ts"),
      metaFile,
    );
  });

  it("should log progress", () => {
    generate(mockOpts);

    expect(mockOpts.logFn).toHaveBeenCalledWith("Loading /models/core.yaml");
    expect(mockOpts.logFn).toHaveBeenCalledWith(
      "- Generating io.k8s.api.core.v1.ts with 1 definitions",
    );
    expect(mockOpts.logFn).toHaveBeenCalledWith("\n✅ Generated 2 files in the out directory");
  });

  it("should not write anything without a directory", () => {
    const results = generate({ ...mockOpts, directory: undefined });

    expect(Object.keys(results)).toHaveLength(2);
    expect(fs.writeFileSync).not.toHaveBeenCalled();
    expect(fs.mkdirSync).not.toHaveBeenCalled();
  });

  it("should use the runtime package override", () => {
    const results = generate({ ...mockOpts, runtimePackage: "my-runtime" });

    expect(results["io.k8s.api.core.v1.ts"].split("\n")[0]).toBe(
      "import { KubernetesObject } from 'my-runtime';",
    );
  });

  it("should fail when the source does not exist", () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);

    expect(() => generate({ ...mockOpts, source: "/models/missing.yaml" })).toThrow(
      "Failed to read /models/missing.yaml as a model file",
    );
  });
});

describe("groupByFile", () => {
  function object(name: string, pkg: string): SchemaObject {
    return {
      kind: "object",
      name,
      package: pkg,
      namespace: [],
      description: "",
      properties: new Map(),
      nestedTypes: [],
      groupVersionKinds: [],
      isKubernetesObject: false,
    };
  }

  it("should sort files and the definitions within them by name", () => {
    const definitions = [
      object("Zed", "b.b.b"),
      object("Beta", "a.a.a"),
      object("Alpha", "b.b.b"),
    ];
    const language = new TypeScript(buildRefObjects(definitions));

    const files = groupByFile(language, definitions);

    expect([...files.keys()]).toEqual(["a.a.a.ts", "b.b.b.ts"]);
    expect(files.get("b.b.b.ts")?.map(d => d.name)).toEqual(["Alpha", "Zed"]);
  });
});

describe("renderFile", () => {
  it("should separate definitions by a blank line and omit an empty header", () => {
    const alias = (name: string): Alias => ({
      kind: "alias",
      name,
      package: "a.b.c",
      description: "",
      type: { kind: "primitive", primitive: "string" },
    });
    const language = new TypeScript(buildRefObjects([]));

    expect(renderFile(language, [alias("A"), alias("B")])).toBe(
      "export type A = string;\n\nexport type B = string;\n",
    );
  });
});
