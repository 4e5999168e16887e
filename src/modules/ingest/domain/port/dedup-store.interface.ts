export interface IDedupStore {
  readonly size: number;
  contains(id: string): Promise<boolean>;
  mark(id: string): Promise<void>;
  /**
   * Test-and-insert as one critical section. Resolves true when the identity was new.
   */
  checkAndMark(id: string): Promise<boolean>;
}
