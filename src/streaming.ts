import { createLogger } from "./log.ts";
import type { StreamItem } from "./types.ts";

const log = createLogger("stream");

/**
 * FIFO of stream items for one correlation id. Single consumer.
 *
 * Once an `end` item is queued nothing further is accepted, so the consumer
 * always sees the chunks that preceded the end and nothing after it.
 */
export class ChunkQueue {
  private items: StreamItem[] = [];
  private waiter: ((item: StreamItem | null) => void) | null = null;
  private ended = false;

  push(item: StreamItem): boolean {
    if (this.ended) return false;
    if (item.type === "end") this.ended = true;

    if (this.waiter) {
      const wake = this.waiter;
      this.waiter = null;
      wake(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  end(): boolean {
    return this.push({ type: "end" });
  }

  get isEnded(): boolean {
    return this.ended;
  }

  /** Next item, or null if nothing arrived within `timeoutMs`. */
  next(timeoutMs: number): Promise<StreamItem | null> {
    const item = this.items.shift();
    if (item) return Promise.resolve(item);

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);
      this.waiter = (next) => {
        clearTimeout(timer);
        resolve(next);
      };
    });
  }
}

export interface StreamHandle {
  id: string;
  queue: ChunkQueue;
  /** Called once when the browser side is done; `stopProducer` asks the agent to stop. */
  finish: (stopProducer: boolean) => void;
}

/**
 * Adapts an active stream to a pull-based HTTP body.
 *
 * The body ends on `end`, or when no chunk arrives within `chunkTimeoutMs`
 * (producer stalled). A browser disconnect cancels the body, which finishes
 * the stream and tells the producer to stop.
 */
export function streamToBrowser(
  handle: StreamHandle,
  chunkTimeoutMs: number,
): ReadableStream<Uint8Array> {
  let finished = false;
  const finish = (stopProducer: boolean) => {
    if (finished) return;
    finished = true;
    handle.finish(stopProducer);
  };

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      const item = await handle.queue.next(chunkTimeoutMs);
      if (finished) return;
      if (item === null) {
        log.warn("Stream stalled, closing", { id: handle.id, timeoutMs: chunkTimeoutMs });
        finish(true);
        controller.close();
        return;
      }
      if (item.type === "end") {
        finish(false);
        controller.close();
        return;
      }
      controller.enqueue(item.data);
    },
    cancel() {
      log.debug("Browser dropped stream", { id: handle.id });
      finish(true);
    },
  });
}
