/**
 * Node.js implementation of IEnvironment
 */

import type * as NodeOS from "node:os";
import { createFilePath } from "../file-path.js";
import type { IEnvironment } from "../types.js";

export type NodeProcess = Pick<NodeJS.Process, "cwd" | "env" | "platform" | "argv" | "argv0">;

interface NodeEnvironmentOptions {
  os: typeof NodeOS;
  /** Defaults to the running process. */
  process?: NodeProcess;
}

export class NodeEnvironment implements IEnvironment {
  private os: typeof NodeOS;
  private process: NodeProcess;

  constructor(options: NodeEnvironmentOptions) {
    this.os = options.os;
    this.process = options.process ?? process;
  }

  currentDirectory(): string {
    return this.process.cwd();
  }

  getVariable(name: string): string | undefined {
    return this.process.env[name];
  }

  temporaryDirectory(): string {
    return this.os.tmpdir();
  }

  /**
   * Base name of the running script, or of the executable when there is none.
   */
  processName(): string {
    const paths = createFilePath({ osName: this.process.platform });
    return paths.getBaseName(this.process.argv[1] ?? this.process.argv0);
  }

  osName(): string {
    return this.process.platform;
  }
}
