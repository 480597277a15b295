import { useCallback, useEffect, useRef, useState } from "react";
import { takeBatch, type Receiver } from "./channel.js";
import { errorMessage, log } from "./logging.js";

export type StreamStatus = "processing" | "idle" | "done" | "failed";

export interface ItemStream<T> {
  items: T[];
  status: StreamStatus;
  error: string | null;
  pull: (count?: number) => void;
  restart: () => void;
}

export interface ItemStreamOptions {
  /** Values taken from the channel per pull. */
  batchSize?: number;
  /** Keep pulling until this many values are buffered. */
  prefetch?: number;
}

/**
 * Drains a pipeline receiver into a growing buffer, one batch at a time.
 * The receiver is closed when the component unmounts or the stream restarts,
 * which stops the producer.
 */
export function useItemStream<T>(open: () => Receiver<T>, options: ItemStreamOptions = {}): ItemStream<T> {
  const batchSize = options.batchSize ?? 4;
  const prefetch = options.prefetch ?? 0;
  const [generation, setGeneration] = useState(0);
  const [items, setItems] = useState<T[]>([]);
  const [status, setStatus] = useState<StreamStatus>("processing");
  const [error, setError] = useState<string | null>(null);
  const receiverRef = useRef<Receiver<T> | null>(null);
  const pendingRef = useRef(false);
  const endedRef = useRef(false);

  const pull = useCallback(
    (count: number = batchSize): void => {
      const receiver = receiverRef.current;
      if (!receiver || pendingRef.current || endedRef.current) {
        return;
      }

      pendingRef.current = true;
      setStatus("processing");
      void takeBatch(receiver, count)
        .then((batch) => {
          if (receiverRef.current !== receiver) {
            return;
          }

          if (batch.length > 0) {
            setItems((previous) => [...previous, ...batch]);
          }

          if (batch.length < count) {
            endedRef.current = true;
            const outcome = receiver.outcome;
            if (outcome?.reason === "failed") {
              setError(outcome.error?.message || "unknown error");
              setStatus("failed");
            } else {
              setStatus("done");
            }
            return;
          }

          setStatus("idle");
        })
        .catch((err: unknown) => {
          log.error("stream consumer failed", { error: errorMessage(err) });
          endedRef.current = true;
          setError(errorMessage(err));
          setStatus("failed");
        })
        .finally(() => {
          if (receiverRef.current === receiver) {
            pendingRef.current = false;
          }
        });
    },
    [batchSize]
  );

  useEffect(() => {
    const receiver = open();
    receiverRef.current = receiver;
    pendingRef.current = false;
    endedRef.current = false;
    setItems([]);
    setError(null);
    pull();

    return () => {
      receiverRef.current = null;
      receiver.close();
    };
  }, [open, generation, pull]);

  useEffect(() => {
    if (status === "idle" && items.length < prefetch) {
      pull();
    }
  }, [items.length, prefetch, pull, status]);

  const restart = useCallback((): void => {
    setGeneration((value) => value + 1);
  }, []);

  return { items, status, error, pull, restart };
}
