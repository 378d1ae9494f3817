import { BufferedStream, type InputStream, type OutputStream } from "./streams.js";

/**
 * Control value threaded through every stream stage of one run.
 *
 * A stage reads `input`, writes `output`, then calls `handoff()`: the output is
 * flushed and becomes the next stage's input, and a fresh output buffer is opened.
 * Nothing else is shared between stages.
 */
export class StreamContext<T> {
  private current: BufferedStream<T>;
  private next: BufferedStream<T>;
  private handoffCount = 0;

  constructor(initial: Iterable<T> = []) {
    this.current = new BufferedStream(initial);
    this.next = new BufferedStream();
  }

  get input(): InputStream<T> {
    return this.current;
  }

  get output(): OutputStream<T> {
    return this.next;
  }

  /** Number of completed handoffs, i.e. writing stages that finished */
  get handoffs(): number {
    return this.handoffCount;
  }

  handoff(): void {
    this.next.flush();
    this.current = this.next;
    this.next = new BufferedStream();
    this.handoffCount++;
  }

  /** Items the next reading stage will see, without consuming them */
  peek(): T[] {
    return this.current.toArray();
  }
}
