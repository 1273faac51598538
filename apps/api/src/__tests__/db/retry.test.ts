import { describe, it, expect, vi } from 'vitest'

import { isBusyError, withStoreRetry } from '../../db/retry'
import { StoreBusyError, StoreError } from '../../errors'

function sqliteError(code: string): Error {
  return Object.assign(new Error(`database error ${code}`), { code })
}

describe('isBusyError', () => {
  it('recognizes busy and locked codes, including extended ones', () => {
    expect(isBusyError(sqliteError('SQLITE_BUSY'))).toBe(true)
    expect(isBusyError(sqliteError('SQLITE_BUSY_SNAPSHOT'))).toBe(true)
    expect(isBusyError(sqliteError('SQLITE_LOCKED'))).toBe(true)
    expect(isBusyError(sqliteError('SQLITE_CONSTRAINT'))).toBe(false)
    expect(isBusyError(new Error('plain'))).toBe(false)
    expect(isBusyError('SQLITE_BUSY')).toBe(false)
  })
})

describe('withStoreRetry', () => {
  it('returns the first successful result', async () => {
    const operation = vi.fn(() => 42)
    await expect(withStoreRetry(operation, { attempts: 3, delayMs: 0 })).resolves.toBe(42)
    expect(operation).toHaveBeenCalledTimes(1)
  })

  it('re-runs the whole operation until the store frees up', async () => {
    const onBusy = vi.fn()
    const operation = vi
      .fn<[], string>()
      .mockImplementationOnce(() => {
        throw sqliteError('SQLITE_BUSY')
      })
      .mockImplementationOnce(() => {
        throw sqliteError('SQLITE_BUSY')
      })
      .mockImplementation(() => 'ok')

    await expect(withStoreRetry(operation, { attempts: 5, delayMs: 0, onBusy })).resolves.toBe('ok')
    expect(operation).toHaveBeenCalledTimes(3)
    expect(onBusy).toHaveBeenCalledTimes(2)
    expect(onBusy.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2])
  })

  it('gives up with StoreBusyError after the attempt budget', async () => {
    const busy = sqliteError('SQLITE_BUSY')
    const operation = vi.fn(() => {
      throw busy
    })

    const error = await withStoreRetry(operation, { attempts: 4, delayMs: 0 }).catch((e: unknown) => e)
    expect(error).toBeInstanceOf(StoreBusyError)
    expect(error).toMatchObject({ attempts: 4, code: 'store_busy', cause: busy })
    expect(operation).toHaveBeenCalledTimes(4)
  })

  it('waits between busy attempts', async () => {
    vi.useFakeTimers()
    try {
      const operation = vi
        .fn<[], number>()
        .mockImplementationOnce(() => {
          throw sqliteError('SQLITE_BUSY')
        })
        .mockImplementation(() => 7)

      const result = withStoreRetry(operation, { attempts: 2, delayMs: 500 })
      await vi.advanceTimersByTimeAsync(499)
      expect(operation).toHaveBeenCalledTimes(1)
      await vi.advanceTimersByTimeAsync(1)
      await expect(result).resolves.toBe(7)
    } finally {
      vi.useRealTimers()
    }
  })

  it('wraps other failures in StoreError without retrying', async () => {
    const operation = vi.fn(() => {
      throw sqliteError('SQLITE_CORRUPT')
    })

    const error = await withStoreRetry(operation, { attempts: 5, delayMs: 0 }).catch((e: unknown) => e)
    expect(error).toBeInstanceOf(StoreError)
    expect(error).toMatchObject({ message: 'Ledger operation failed: database error SQLITE_CORRUPT' })
    expect(operation).toHaveBeenCalledTimes(1)
  })

  it('passes a StoreError through unchanged', async () => {
    const original = new StoreError('row vanished')
    const error = await withStoreRetry(() => {
      throw original
    }, { attempts: 2, delayMs: 0 }).catch((e: unknown) => e)
    expect(error).toBe(original)
  })
})
