import { Injectable } from '@nestjs/common';

/**
 * DocumentLockService
 *
 * One exclusive critical section per document id. Callers for the same
 * document queue in arrival order; different documents never wait on each
 * other. The lock is released whether the work resolves or throws.
 *
 * NOTE: in-process only. Instances sharing a database still rely on the
 * storage unique constraints for decision and assignment uniqueness.
 */
@Injectable()
export class DocumentLockService {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(documentId: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(documentId) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(documentId, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(documentId) === tail) {
        this.tails.delete(documentId);
      }
    }
  }
}
