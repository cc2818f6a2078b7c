class Node<T> {
  value: T;
  next: Node<T> | null;

  constructor(value: T) {
    this.value = value;
    this.next = null;
  }
}

export class Queue<T> {
  private head: Node<T> | null = null;
  private tail: Node<T> | null = null;
  private size = 0;

  enqueue(value: T): void {
    const node = new Node(value);

    if (this.tail) {
      this.tail.next = node;
      this.tail = node;
    } else {
      this.head = node;
      this.tail = node;
    }

    this.size++;
  }

  dequeue(): T | undefined {
    if (!this.head) {
      return undefined;
    }

    const value = this.head.value;
    this.head = this.head.next;
    this.size--;

    if (!this.head) {
      this.tail = null;
    }

    return value;
  }

  clear(): void {
    this.head = null;
    this.tail = null;
    this.size = 0;
  }

  getSize(): number {
    return this.size;
  }
}

type Waiter<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Unbounded single-consumer channel. Producers `push`, the consumer iterates
 * with `for await`. After `close()` buffered values are still delivered, then
 * iteration ends; later pushes are ignored.
 */
export class Channel<T> implements AsyncIterable<T> {
  private buffer = new Queue<{ value: T }>();
  private waiters = new Queue<Waiter<T>>();
  private _closed = false;

  get closed() {
    return this._closed;
  }

  get pending() {
    return this.buffer.getSize();
  }

  push(value: T): boolean {
    if (this._closed) return false;

    const waiter = this.waiters.dequeue();
    if (waiter) waiter({ value, done: false });
    else this.buffer.enqueue({ value });

    return true;
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;

    let waiter = this.waiters.dequeue();
    while (waiter) {
      waiter({ value: undefined, done: true });
      waiter = this.waiters.dequeue();
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const entry = this.buffer.dequeue();
    if (entry) return Promise.resolve({ value: entry.value, done: false });
    if (this._closed) return Promise.resolve({ value: undefined, done: true });

    return new Promise((resolve) => this.waiters.enqueue(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
