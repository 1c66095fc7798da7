/**
 * Newline-delimited JSON writer for streamed responses
 *
 * Writes one JSON line per item, waits for "drain" when the sink is full,
 * and stops pulling items once the sink closes (client went away).
 */

type SinkEvent = "drain" | "close";

/** The part of an HTTP response (or any Writable) the writer needs */
export interface NdjsonSink {
  write(chunk: string): boolean;
  once(event: SinkEvent, listener: () => void): unknown;
  off(event: SinkEvent, listener: () => void): unknown;
}

function waitForDrainOrClose(sink: NdjsonSink): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      sink.off("drain", done);
      sink.off("close", done);
      resolve();
    };
    sink.once("drain", done);
    sink.once("close", done);
  });
}

/**
 * Write every item as one JSON line
 *
 * Returning early ends the iterator, so a generator behind it does no
 * further work.
 *
 * @returns true if every item was written, false if the sink closed first
 */
export async function writeNdjson<T>(
  items: AsyncIterable<T>,
  sink: NdjsonSink
): Promise<boolean> {
  let closed = false;
  const onClose = () => {
    closed = true;
  };
  sink.once("close", onClose);

  try {
    for await (const item of items) {
      if (closed) return false;

      if (!sink.write(`${JSON.stringify(item)}\n`) && !closed) {
        await waitForDrainOrClose(sink);
      }
      if (closed) return false;
    }
    return true;
  } finally {
    sink.off("close", onClose);
  }
}
