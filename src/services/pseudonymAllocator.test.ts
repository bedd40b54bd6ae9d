import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PseudonymAllocator } from './pseudonymAllocator';
import { InMemoryPersistentIdRepository } from '../repositories/memory';
import { StorageError } from '../lib/errors';

describe('PseudonymAllocator', () => {
  let repo: InMemoryPersistentIdRepository;

  beforeEach(() => {
    repo = new InMemoryPersistentIdRepository();
  });

  function sequence(...values: string[]) {
    return () => values.shift() ?? 'exhausted';
  }

  it('returns the same identifier for the same user and SP', async () => {
    const allocator = new PseudonymAllocator(repo, { maxAttempts: 5 });
    const first = await allocator.getOrCreate('u1', 'sp-1');
    const second = await allocator.getOrCreate('u1', 'sp-1');

    expect(second).toBe(first);
    expect(first).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('gives distinct users distinct identifiers at one SP', async () => {
    const allocator = new PseudonymAllocator(repo, { maxAttempts: 5 });
    const ids = await Promise.all(['u1', 'u2', 'u3'].map((u) => allocator.getOrCreate(u, 'sp-1')));
    expect(new Set(ids).size).toBe(3);
  });

  it('regenerates after a collision with another user', async () => {
    const allocator = new PseudonymAllocator(repo, { maxAttempts: 5, generate: sequence('dup', 'dup', 'fresh') });

    expect(await allocator.getOrCreate('u1', 'sp-1')).toBe('dup');
    expect(await allocator.getOrCreate('u2', 'sp-1')).toBe('fresh');
  });

  it('may reuse a value across SPs', async () => {
    const allocator = new PseudonymAllocator(repo, { maxAttempts: 5, generate: sequence('same', 'same') });
    expect(await allocator.getOrCreate('u1', 'sp-1')).toBe('same');
    expect(await allocator.getOrCreate('u2', 'sp-2')).toBe('same');
  });

  it('returns the winning row when a concurrent request inserted first', async () => {
    await repo.insert('sp-1', 'u1', 'winner');
    vi.spyOn(repo, 'find').mockResolvedValueOnce(null);
    const allocator = new PseudonymAllocator(repo, { maxAttempts: 5, generate: sequence('loser') });

    expect(await allocator.getOrCreate('u1', 'sp-1')).toBe('winner');
  });

  it('gives up after the configured number of attempts', async () => {
    await repo.insert('sp-1', 'u1', 'dup');
    const allocator = new PseudonymAllocator(repo, { maxAttempts: 3, generate: () => 'dup' });

    const attempt = allocator.getOrCreate('u2', 'sp-1');
    await expect(attempt).rejects.toBeInstanceOf(StorageError);
    await expect(attempt).rejects.toThrow('persistent id allocation failed after 3 attempts');
  });

  it('propagates storage failures other than conflicts', async () => {
    vi.spyOn(repo, 'insert').mockRejectedValueOnce(new Error('connection lost'));
    const allocator = new PseudonymAllocator(repo, { maxAttempts: 5 });
    await expect(allocator.getOrCreate('u1', 'sp-1')).rejects.toThrow('connection lost');
  });
});
