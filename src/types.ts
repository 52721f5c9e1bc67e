// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2023-Present The Kubernetes Fluent Client Authors

/** Log function callback, `console.log` when run from the CLI. */
export type LogFn = (...args: unknown[]) => void;
