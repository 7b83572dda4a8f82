/**
 * Code Session
 *
 * Process-wide table of loaded modules (consulted for redefinition
 * warnings) and the per-run compilation session that collects every
 * artifact produced and notifies an optional listener.
 */

import { randomUUID } from 'node:crypto';
import type { Artifact } from '../artifact/artifact.js';
import { success, type Result } from '../result.js';

// ============================================================
// LOADED MODULES
// ============================================================

/** Where the loaded version of a module came from */
export type LoadOrigin =
  | { readonly kind: 'path'; readonly path: string }
  | { readonly kind: 'memory' };

export interface LoadedModule {
  readonly module: string;
  readonly artifact: Artifact;
  readonly origin: LoadOrigin;
}

export class CodeSession {
  private readonly loaded = new Map<string, LoadedModule>();

  isLoaded(module: string): LoadedModule | undefined {
    return this.loaded.get(module);
  }

  register(module: string, artifact: Artifact, origin: LoadOrigin = { kind: 'memory' }): void {
    this.loaded.set(module, { module, artifact, origin });
  }

  /** Remove a module; returns false when it was not loaded */
  purge(module: string): boolean {
    return this.loaded.delete(module);
  }

  modules(): string[] {
    return [...this.loaded.keys()].sort();
  }
}

// ============================================================
// LOADER
// ============================================================

export interface LoadOptions {
  /** Source file the module was compiled from */
  readonly file: string;
  readonly sessionId: string;
}

/**
 * Turns a finished artifact into a loaded module.
 * Returns a failure reason instead of throwing for load errors.
 */
export interface Loader {
  load(
    module: string,
    artifact: Artifact,
    options: LoadOptions
  ): Result<LoadedModule, string> | Promise<Result<LoadedModule, string>>;
}

/** Loader that only records artifacts in a CodeSession */
export class CodeSessionLoader implements Loader {
  readonly session: CodeSession;

  constructor(session: CodeSession) {
    this.session = session;
  }

  load(module: string, artifact: Artifact): Result<LoadedModule, string> {
    this.session.register(module, artifact, { kind: 'memory' });
    return success({ module, artifact, origin: { kind: 'memory' } });
  }
}

// ============================================================
// COMPILATION SESSION
// ============================================================

export interface ModuleAvailableEvent {
  readonly sessionId: string;
  readonly module: string;
  readonly file: string;
  readonly artifact: Artifact;
}

/**
 * Listener told about each module as soon as its artifact exists.
 * Compilation waits for the returned promise (acknowledgement).
 */
export type ModuleAvailableListener = (
  event: ModuleAvailableEvent
) => void | Promise<void>;

export class CompilationSession {
  readonly id: string;
  private readonly produced: { module: string; artifact: Artifact }[] = [];
  private readonly listener: ModuleAvailableListener | undefined;

  constructor(options: { id?: string; listener?: ModuleAvailableListener } = {}) {
    this.id = options.id ?? randomUUID();
    this.listener = options.listener;
  }

  /** Artifacts produced so far, oldest first */
  get binaries(): readonly { module: string; artifact: Artifact }[] {
    return [...this.produced];
  }

  async moduleAvailable(module: string, file: string, artifact: Artifact): Promise<void> {
    this.produced.push({ module, artifact });
    if (this.listener) {
      await this.listener({ sessionId: this.id, module, file, artifact });
    }
  }
}
