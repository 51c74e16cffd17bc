import { describe, expect, test } from 'vitest'

import { WorkerPool } from './pool.js'

describe('WorkerPool', () => {
  test('never runs more tasks than slots', async () => {
    const pool = new WorkerPool(2)
    let peak = 0
    const task = async (n: number) => {
      peak = Math.max(peak, pool.running)
      await new Promise((resolve) => setTimeout(resolve, 5))
      return n * 2
    }

    const results = await Promise.all([1, 2, 3, 4, 5].map((n) => pool.run(() => task(n))))

    expect(results).toEqual([2, 4, 6, 8, 10])
    expect(peak).toBe(2)
    expect(pool.running).toBe(0)
  })

  test('releases the slot when a task throws', async () => {
    const pool = new WorkerPool(1)

    await expect(pool.run(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom')
    await expect(pool.run(() => Promise.resolve('next'))).resolves.toBe('next')
  })

  test('rejects a pool without slots', () => {
    expect(() => new WorkerPool(0)).toThrow('Worker pool needs at least one slot, got 0')
  })
})
