/**
 * Compilation Phases
 *
 * evaluating → before-hooks → assembling → building → after-hooks → closed,
 * with a jump to closed allowed from anywhere.
 */

import { createError } from '../error-classes.js';

export type CompilationPhase =
  | 'evaluating'
  | 'before-hooks'
  | 'assembling'
  | 'building'
  | 'after-hooks'
  | 'closed';

const NEXT_PHASE: Record<CompilationPhase, CompilationPhase | undefined> = {
  evaluating: 'before-hooks',
  'before-hooks': 'assembling',
  assembling: 'building',
  building: 'after-hooks',
  'after-hooks': 'closed',
  closed: undefined,
};

export type PhaseListener = (from: CompilationPhase, to: CompilationPhase) => void;

export class PhaseTracker {
  readonly module: string;
  private phase: CompilationPhase = 'evaluating';
  private readonly listener: PhaseListener | undefined;

  constructor(module: string, listener?: PhaseListener) {
    this.module = module;
    this.listener = listener;
  }

  get current(): CompilationPhase {
    return this.phase;
  }

  /** Definitions are accepted while the body and before-compile hooks run */
  get canDefine(): boolean {
    return this.phase === 'evaluating' || this.phase === 'before-hooks';
  }

  /** @throws CompileError MODF-H003 unless `to` follows the current phase */
  advance(to: CompilationPhase): void {
    if (NEXT_PHASE[this.phase] !== to) {
      throw createError('MODF-H003', { module: this.module, from: this.phase, to });
    }
    this.move(to);
  }

  /** Jump to closed; does nothing when already closed */
  close(): void {
    if (this.phase !== 'closed') this.move('closed');
  }

  private move(to: CompilationPhase): void {
    const from = this.phase;
    this.phase = to;
    this.listener?.(from, to);
  }
}
