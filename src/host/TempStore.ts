/**
 * TempStore — keyed scratch storage that survives between frames.
 *
 * Widgets have no retained objects of their own in an immediate-mode UI;
 * anything that must outlive a frame is parked here under an id. Nothing
 * is written to disk.
 */

export type TypeGuard<T> = (value: unknown) => value is T;

export class TempStore {
  private values: Map<string, unknown> = new Map();

  /**
   * Read the value stored under `id`. Returns undefined when nothing is
   * stored or the stored value is not accepted by `guard`.
   */
  getTemp<T>(id: string, guard: TypeGuard<T>): T | undefined {
    const value = this.values.get(id);
    return guard(value) ? value : undefined;
  }

  insertTemp<T>(id: string, value: T): void {
    this.values.set(id, value);
  }

  removeTemp(id: string): void {
    this.values.delete(id);
  }

  has(id: string): boolean {
    return this.values.has(id);
  }

  clear(): void {
    this.values.clear();
  }
}
