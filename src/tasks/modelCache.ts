/**
 * @fileoverview Holder of the last successfully loaded model.
 *
 * Writes replace the whole value; readers always see a model produced by
 * one completed load.
 *
 * @module tasks/modelCache
 */

export class ModelCache<TModel> {
  private model: TModel | undefined;
  private generation = 0;

  get(): TModel | undefined {
    return this.model;
  }

  /** Number of successful stores so far. */
  get version(): number {
    return this.generation;
  }

  /**
   * Store a new model.
   *
   * @returns The model it replaced
   */
  swap(next: TModel): TModel | undefined {
    const previous = this.model;
    this.model = next;
    this.generation++;
    return previous;
  }

  clear(): void {
    this.model = undefined;
  }
}
