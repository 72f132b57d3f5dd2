/**
 * Fixed environment for tests and sandboxes
 */

import type { IEnvironment } from "../types.js";

export interface MemEnvironmentOptions {
  cwd?: string;
  variables?: Record<string, string>;
  tmpdir?: string;
  processName?: string;
  osName?: string;
}

export class MemEnvironment implements IEnvironment {
  private cwd: string;
  private variables: Map<string, string>;
  private tmpdir: string;
  private name: string;
  private os: string;

  constructor(options: MemEnvironmentOptions = {}) {
    this.cwd = options.cwd ?? "/";
    this.variables = new Map(Object.entries(options.variables ?? {}));
    this.tmpdir = options.tmpdir ?? "/tmp";
    this.name = options.processName ?? "app";
    this.os = options.osName ?? "linux";
  }

  currentDirectory(): string {
    return this.cwd;
  }

  getVariable(name: string): string | undefined {
    return this.variables.get(name);
  }

  temporaryDirectory(): string {
    return this.tmpdir;
  }

  processName(): string {
    return this.name;
  }

  osName(): string {
    return this.os;
  }
}
