import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import path from 'node:path'
import type { z } from 'zod'

/**
 * Whole-record JSON file with a serialized work queue.
 *
 * Every read and read-modify-write goes through the queue, so concurrent
 * callers observe each other's writes in submission order (first writer wins).
 */
export class JsonFileStore<S extends z.ZodTypeAny> {
  private queue: Promise<unknown> = Promise.resolve()

  constructor(
    readonly filePath: string,
    private readonly schema: S,
    private readonly initial: () => z.output<S>
  ) {}

  read(): Promise<z.output<S>> {
    return this.enqueue(() => this.load())
  }

  /**
   * Load, let `mutate` change the record in place, then rewrite the file.
   * If `mutate` throws, nothing is written and the error reaches the caller.
   */
  update<R>(mutate: (data: z.output<S>) => R): Promise<R> {
    return this.enqueue(async () => {
      const data = await this.load()
      const result = mutate(data)
      await this.save(data)
      return result
    })
  }

  private enqueue<R>(work: () => Promise<R>): Promise<R> {
    const run = this.queue.then(work)
    // keep the chain alive after a failed item; the caller observes the
    // rejection through `run`
    this.queue = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }

  private async load(): Promise<z.output<S>> {
    let raw: string
    try {
      raw = await readFile(this.filePath, 'utf8')
    } catch (err) {
      if (isMissingFile(err)) return this.initial()
      throw err
    }
    return this.schema.parse(JSON.parse(raw))
  }

  private async save(data: z.output<S>) {
    await mkdir(path.dirname(this.filePath), { recursive: true })
    const tmp = `${this.filePath}.${process.pid}.tmp`
    await writeFile(tmp, `${JSON.stringify(data, null, 2)}\n`, 'utf8')
    await rename(tmp, this.filePath)
  }
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}
