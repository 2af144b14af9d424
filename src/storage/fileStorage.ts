import { mkdir, readFile, rename, writeFile } from 'fs/promises'
import { homedir } from 'os'
import { dirname, join } from 'path'
import { z } from 'zod'
import { JsonObject } from '../helpers/historyInterfaces'
import { jsonObjectSchema } from '../helpers/historySchemas'
import { DocumentStorage } from './documentStorage'
import { COLLECTION_NAMES, StorageKind } from './interfaces'
import { MemoryCollections, MemoryDocumentStore, emptyCollections } from './memoryStorage'

export const DEFAULT_HISTORY_FILE = '~/.job-history/history.json'

const historyFileSchema = z.object({
  version: z.literal(1),
  collections: z.record(z.string(), z.record(z.string(), jsonObjectSchema)),
})

export function expandHome(path: string): string {
  if (path === '~') return homedir()
  if (path.startsWith('~/')) return join(homedir(), path.slice(2))
  return path
}

// fs errors may come from another realm, so only their code is checked
function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
  )
}

async function loadCollections(path: string): Promise<MemoryCollections> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    if (isMissingFile(error)) return emptyCollections()
    throw error
  }

  const parsed = historyFileSchema.safeParse(JSON.parse(text))
  if (!parsed.success) {
    throw new Error(`${path} is not a job history file: ${parsed.error.message}`)
  }
  const collections = emptyCollections()
  for (const name of COLLECTION_NAMES) {
    const documents = parsed.data.collections[name] ?? {}
    collections.set(name, new Map(Object.entries(documents)))
  }
  return collections
}

/**
 * The memory store written through to a JSON file after every write, and
 * once per transaction inside one.
 */
export class FileDocumentStore extends MemoryDocumentStore {
  readonly kind: StorageKind = 'file'
  readonly path: string

  private constructor(path: string, collections: MemoryCollections) {
    super(collections)
    this.path = path
  }

  static async open(path: string): Promise<FileDocumentStore> {
    const resolved = expandHome(path)
    const store = new FileDocumentStore(resolved, await loadCollections(resolved))
    // probes that the file is writable
    await store.save()
    return store
  }

  async close(): Promise<void> {
    await this.save()
    await super.close()
  }

  protected async written(): Promise<void> {
    if (this.inTransaction) return
    await this.save()
  }

  private async save(): Promise<void> {
    const collections: { [name: string]: { [id: string]: JsonObject } } = {}
    for (const [name, documents] of this.collections) {
      collections[name] = Object.fromEntries(documents)
    }
    await mkdir(dirname(this.path), { recursive: true })
    // replaced atomically by rename
    const temporary = `${this.path}.tmp`
    await writeFile(
      temporary,
      JSON.stringify({ version: 1, collections }, null, 2),
      'utf8'
    )
    await rename(temporary, this.path)
  }
}

/** Local durable history, used when no remote store is reachable. */
export class FileStorage extends DocumentStorage {
  static async open(path: string = DEFAULT_HISTORY_FILE, user?: string): Promise<FileStorage> {
    return new FileStorage(await FileDocumentStore.open(path), user)
  }
}
