import { tokenize } from "./tokenizer.js";
import type { MessageQuery } from "./types.js";

export const DEFAULT_MIN_SCORE = 0;

/** A Set that rejects writes once its initial members are in. */
class FrozenSet<T> extends Set<T> {
  private sealed = false;

  constructor(values: Iterable<T>) {
    super(values);
    this.sealed = true;
  }

  override add(value: T): this {
    if (this.sealed) {
      throw new TypeError("Message token set is read-only");
    }
    return super.add(value);
  }

  override delete(): boolean {
    throw new TypeError("Message token set is read-only");
  }

  override clear(): void {
    throw new TypeError("Message token set is read-only");
  }
}

export function buildMessageQuery(
  message: string,
  minScore: number = DEFAULT_MIN_SCORE,
): MessageQuery {
  const tokens = Object.freeze(tokenize(message));
  return Object.freeze({
    message,
    tokens,
    tokenSet: new FrozenSet(tokens),
    minScore,
  });
}
