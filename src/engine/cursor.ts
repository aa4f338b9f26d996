import { ExtractionError } from './errors';
import type { Batch } from './types';

type CursorState = 'ready' | 'reading' | 'exhausted';

/**
 * Lazy, finite, single-pass sequence of batches.
 * Once the underlying generator ends, throws or is returned early, the cursor
 * stays exhausted and never touches the source again.
 */
export class BatchCursor implements AsyncIterator<Batch, void> {
  private state: CursorState = 'ready';

  constructor(private readonly source: AsyncGenerator<Batch, void, undefined>) {}

  get exhausted(): boolean {
    return this.state === 'exhausted';
  }

  async next(): Promise<IteratorResult<Batch, void>> {
    if (this.state === 'exhausted') {
      return { done: true, value: undefined };
    }

    this.state = 'reading';
    try {
      const result = await this.source.next();
      if (result.done) {
        this.state = 'exhausted';
        return { done: true, value: undefined };
      }
      return { done: false, value: result.value };
    } catch (err) {
      this.state = 'exhausted';
      throw err;
    }
  }

  async return(): Promise<IteratorResult<Batch, void>> {
    if (this.state !== 'exhausted') {
      this.state = 'exhausted';
      await this.source.return(undefined);
    }
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): this {
    return this;
  }
}

/**
 * Base for connector handles: hands out exactly one cursor per opened handle.
 * Re-extracting needs a fresh `open`.
 */
export abstract class ExtractionHandle {
  private cursor: BatchCursor | undefined;

  constructor(readonly sourceName: string) {}

  protected abstract readBatches(): AsyncGenerator<Batch, void, undefined>;

  abstract close(): Promise<void>;

  extract(): BatchCursor {
    if (this.cursor) {
      throw new ExtractionError(this.sourceName, 'extraction is not restartable; open the source again');
    }
    this.cursor = new BatchCursor(this.readBatches());
    return this.cursor;
  }
}
