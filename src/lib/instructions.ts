/**
 * Instruction source.
 *
 * System prompts for the two classifiers live outside the code, either as
 * blobs in Azure Storage or as local text files. Each load returns the text
 * plus a version identifier that is stored next to every result row.
 */

import { BlobServiceClient } from '@azure/storage-blob'
import { readFile } from 'fs/promises'
import path from 'path'
import { ConfigError } from './errors'
import { sha256 } from './hash'

export interface LoadedInstructions {
  text: string
  /** Blob ETag or content hash; null when the backend exposes none */
  version: string | null
}

export interface InstructionSource {
  load(name: string): Promise<LoadedInstructions>
}

/** The slice of the Azure container client this module uses. */
export interface BlobContainer {
  getBlobClient(name: string): {
    download(): Promise<{ readableStreamBody?: NodeJS.ReadableStream; etag?: string }>
  }
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk)
  }
  return Buffer.concat(chunks).toString('utf8')
}

export class AzureBlobInstructionSource implements InstructionSource {
  constructor(private readonly container: BlobContainer) {}

  static fromConnectionString(connectionString: string, container: string): AzureBlobInstructionSource {
    const service = BlobServiceClient.fromConnectionString(connectionString)
    return new AzureBlobInstructionSource(service.getContainerClient(container))
  }

  async load(name: string): Promise<LoadedInstructions> {
    const response = await this.container.getBlobClient(name).download()
    if (!response.readableStreamBody) {
      throw new ConfigError(`Instruction blob has no body: ${name}`, { blob: name })
    }
    return {
      text: await readStream(response.readableStreamBody),
      version: response.etag ?? null,
    }
  }
}

/**
 * Reads instructions from `dir`. The version is a short content hash, so an
 * edited file yields a new version.
 */
export class FileInstructionSource implements InstructionSource {
  constructor(private readonly dir: string) {}

  async load(name: string): Promise<LoadedInstructions> {
    const file = path.resolve(this.dir, name)
    let text: string
    try {
      text = await readFile(file, 'utf8')
    } catch (err) {
      throw new ConfigError(`Instruction file not readable: ${file}`, {
        file,
        cause: err instanceof Error ? err.message : String(err),
      })
    }
    return { text, version: `sha256:${sha256(text).slice(0, 16)}` }
  }
}

export type InstructionBackend =
  | { kind: 'azure_blob'; connectionString: string; container: string }
  | { kind: 'file'; dir: string }

export function createInstructionSource(backend: InstructionBackend): InstructionSource {
  switch (backend.kind) {
    case 'azure_blob':
      return AzureBlobInstructionSource.fromConnectionString(backend.connectionString, backend.container)
    case 'file':
      return new FileInstructionSource(backend.dir)
  }
}
