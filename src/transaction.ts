/**
 * Synth Engine - Transaction Manager
 *
 * Single-writer, copy-on-write transactions. An operation runs against a
 * draft copy of the state; the draft replaces the live state only when the
 * operation returns. A throw discards the draft, so validation order inside
 * an operation never decides what survives a failure.
 */

import type { Logger } from "winston";
import { describeError, isEngineError } from "./errors";
import { EngineState, cloneState } from "./state";

export type TransactionListener = (label: string, state: EngineState) => void;

export class TransactionManager {
  private state: EngineState;
  private active: string | null = null;
  private readonly listeners: TransactionListener[] = [];

  constructor(
    initial: EngineState,
    private readonly logger: Logger,
  ) {
    this.state = initial;
  }

  /** Called after every commit with the new live state */
  onCommit(listener: TransactionListener): void {
    this.listeners.push(listener);
  }

  /** Run a mutating operation; commits on return, rolls back on throw */
  execute<T>(label: string, fn: (draft: EngineState) => T): T {
    this.enter(label);
    const draft = cloneState(this.state);
    try {
      const result = fn(draft);
      this.state = draft;
      this.logger.info(`${label} committed`);
      for (const listener of this.listeners) listener(label, this.state);
      return result;
    } catch (err) {
      this.logFailure(label, err);
      throw err;
    } finally {
      this.active = null;
    }
  }

  /** Like execute, but the draft is always discarded */
  simulate<T>(label: string, fn: (draft: EngineState) => T): T {
    this.enter(label);
    try {
      const result = fn(cloneState(this.state));
      this.logger.info(`${label} simulated`);
      return result;
    } catch (err) {
      this.logFailure(label, err);
      throw err;
    } finally {
      this.active = null;
    }
  }

  /** Run an operation against a private copy; nothing is ever committed */
  query<T>(fn: (view: EngineState) => T): T {
    return fn(cloneState(this.state));
  }

  /** Consistent point-in-time copy for read-only callers */
  snapshot(): EngineState {
    return cloneState(this.state);
  }

  get inTransaction(): boolean {
    return this.active !== null;
  }

  private logFailure(label: string, err: unknown): void {
    if (isEngineError(err)) {
      this.logger.warn(`${label} rejected: ${err.code} (${err.detail})`);
    } else {
      this.logger.error(`${label} failed: ${describeError(err)}`);
    }
  }

  private enter(label: string): void {
    if (this.active !== null) {
      const msg = `${label} started inside ${this.active}; nested transactions are not supported`;
      this.logger.error(msg);
      throw new Error(msg);
    }
    this.active = label;
  }
}
