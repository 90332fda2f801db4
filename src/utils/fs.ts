import { readFile, writeFile, mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'
import { FileIOError } from './errors'

interface FSX {
  readonly readText: (path: string) => Promise<string>
  readonly writeText: (path: string, content: string) => Promise<void>
}

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8')
  } catch (err) {
    throw new FileIOError(path, 'read', err)
  }
}

/** Writes the whole content in one call; callers prepare it fully first. */
async function writeText(path: string, content: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true })
    await writeFile(path, content, 'utf8')
  } catch (err) {
    throw new FileIOError(path, 'write', err)
  }
}

export const fsx: FSX = { readText, writeText }
