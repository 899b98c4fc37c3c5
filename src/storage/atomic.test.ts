import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  readdirSync,
  readFileSync,
  rmSync,
  writeFileSync
} from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { z } from 'zod'
import { readJsonFile, removeFile, writeJsonAtomic } from './atomic'
import { StorageError } from './errors'

const Doc = z.object({ name: z.string() })

describe('atomic JSON files', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'job-match-storage-test-'))
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  describe('writeJsonAtomic', () => {
    it('creates parent directories and writes pretty JSON', async () => {
      const path = join(tempDir, 'nested', 'dir', 'doc.json')
      await writeJsonAtomic(path, { name: 'a' })
      expect(readFileSync(path, 'utf-8')).toBe('{\n  "name": "a"\n}')
    })

    it('replaces an existing file without leaving temp files', async () => {
      const path = join(tempDir, 'doc.json')
      await writeJsonAtomic(path, { name: 'a' })
      await writeJsonAtomic(path, { name: 'b' })

      expect(readdirSync(tempDir)).toEqual(['doc.json'])
      expect(await readJsonFile(path, Doc)).toEqual({ name: 'b' })
    })

    it('throws a write_failed StorageError when the target is a directory', async () => {
      const path = join(tempDir, 'taken')
      mkdirSync(join(path, 'child'), { recursive: true })

      await expect(writeJsonAtomic(path, { name: 'a' })).rejects.toMatchObject({
        name: 'StorageError',
        kind: 'write_failed',
        path
      })
      expect(readdirSync(tempDir)).toEqual(['taken'])
    })
  })

  describe('readJsonFile', () => {
    it('returns null for a missing file', async () => {
      expect(await readJsonFile(join(tempDir, 'missing.json'), Doc)).toBeNull()
    })

    it('throws corrupted for invalid JSON', async () => {
      const path = join(tempDir, 'bad.json')
      writeFileSync(path, '{')
      const error = await readJsonFile(path, Doc).catch((e: unknown) => e)
      expect(error).toBeInstanceOf(StorageError)
      expect(error).toMatchObject({ kind: 'corrupted' })
    })

    it('throws corrupted when the schema does not match', async () => {
      const path = join(tempDir, 'wrong.json')
      writeFileSync(path, '{"name": 1}')
      await expect(readJsonFile(path, Doc)).rejects.toMatchObject({ kind: 'corrupted' })
    })

    it('throws read_failed when the path is a directory', async () => {
      await expect(readJsonFile(tempDir, Doc)).rejects.toMatchObject({ kind: 'read_failed' })
    })
  })

  describe('removeFile', () => {
    it('returns true when a file was deleted and false when it was missing', async () => {
      const path = join(tempDir, 'doc.json')
      writeFileSync(path, '{}')
      expect(await removeFile(path)).toBe(true)
      expect(existsSync(path)).toBe(false)
      expect(await removeFile(path)).toBe(false)
    })
  })
})
