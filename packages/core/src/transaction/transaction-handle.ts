/**
 * Transaction Handle
 *
 * Wraps one real driver transaction together with the stack of savepoints
 * opened on top of it. A handle is shared by reference between every context
 * derived from the one it was bound into; nested scopes mutate it in place.
 *
 * Lifecycle: `root-active` (depth 0) -> `nested-active` (depth > 0) ->
 * `root-active` -> `finalized`. A finalized handle is never reused.
 */

import { generateUUID, Mutex } from '../utils';

export type HandleState = 'root-active' | 'nested-active' | 'finalized';

export class TransactionHandle<TTx> {
  readonly id: string;
  /** Serializes depth changes together with the savepoint statement that goes with them */
  readonly lock = new Mutex();

  private readonly savepoints: string[] = [];
  private sequence = 0;
  private finalized = false;

  constructor(
    readonly transaction: TTx,
    private readonly savepointPrefix: string,
    readonly adopted = false,
  ) {
    this.id = generateUUID();
  }

  get depth(): number {
    return this.savepoints.length;
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  get state(): HandleState {
    if (this.finalized) {
      return 'finalized';
    }
    return this.depth > 0 ? 'nested-active' : 'root-active';
  }

  get innermostSavepoint(): string | undefined {
    return this.savepoints[this.savepoints.length - 1];
  }

  /**
   * Reserve the next savepoint name. Names are never handed out twice, even
   * after the savepoint they named was released or its statement failed.
   */
  nextSavepointName(): string {
    this.sequence += 1;
    return `${this.savepointPrefix}${this.sequence}`;
  }

  /** Record a savepoint that now exists in the database */
  pushSavepoint(name: string): void {
    this.savepoints.push(name);
  }

  popSavepoint(): string | undefined {
    return this.savepoints.pop();
  }

  finalize(): void {
    this.finalized = true;
    this.savepoints.length = 0;
  }
}
