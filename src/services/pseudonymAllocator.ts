import { randomUUID } from 'crypto';
import { PersistentIdRepository } from '../repositories/interfaces';
import { AllocationConflictError, StorageError } from '../lib/errors';
import logger from '../lib/logger';

export interface PseudonymAllocatorOptions {
  maxAttempts: number;
  generate?: () => string;
}

/**
 * Hands out one stable opaque identifier per (user, SP). Concurrent first
 * requests are settled by the unique indexes: the loser re-reads the winner.
 */
export class PseudonymAllocator {
  private readonly generate: () => string;

  constructor(
    private readonly persistentIds: PersistentIdRepository,
    private readonly options: PseudonymAllocatorOptions
  ) {
    this.generate = options.generate ?? randomUUID;
  }

  async getOrCreate(userId: string, spId: string): Promise<string> {
    const existing = await this.persistentIds.find(spId, userId);
    if (existing) {
      return existing.persistent_id;
    }

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      try {
        const row = await this.persistentIds.insert(spId, userId, this.generate());
        return row.persistent_id;
      } catch (e) {
        if (!(e instanceof AllocationConflictError)) {
          throw e;
        }
        const winner = await this.persistentIds.find(spId, userId);
        if (winner) {
          return winner.persistent_id;
        }
        logger.warn('Persistent id collision, regenerating', { sp: spId, attempt });
      }
    }

    throw new StorageError(`persistent id allocation failed after ${this.options.maxAttempts} attempts`);
  }
}
