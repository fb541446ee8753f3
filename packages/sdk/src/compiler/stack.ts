/**
 * Bounds-checked LIFO stack shared by the postfix converter and the
 * evaluator.
 *
 * @module compiler/stack
 */

export class StackUnderflowError extends Error {
  constructor(operation: 'pop' | 'peek') {
    super(`Cannot ${operation} from an empty stack`);
    this.name = 'StackUnderflowError';
  }
}

export class Stack<T> {
  private readonly items: T[] = [];

  push(item: T): void {
    this.items.push(item);
  }

  pop(): T {
    if (this.items.length === 0) {
      throw new StackUnderflowError('pop');
    }
    const top = this.items[this.items.length - 1];
    this.items.length--;
    return top;
  }

  peek(): T {
    if (this.items.length === 0) {
      throw new StackUnderflowError('peek');
    }
    return this.items[this.items.length - 1];
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  get size(): number {
    return this.items.length;
  }
}
