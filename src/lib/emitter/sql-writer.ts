/**
 * SQL script writer - Transform stream that renders document emissions as SQL text
 */

import { once } from "events";
import { open } from "fs/promises";
import type { WriteStream } from "fs";
import { Transform, pipeline, type TransformCallback } from "stream";
import { promisify } from "util";
import { FileIOError } from "../../utils/errors.js";
import type { DocumentEmission } from "./types.js";
import { renderInsert } from "./statements.js";

const pipelineAsync = promisify(pipeline);

/**
 * Transform stream that converts emissions to INSERT lines.
 * DDL given up front is written before the first document.
 */
export class SqlScriptWriter extends Transform {
  private headerWritten = false;

  constructor(private readonly ddl: string[] = []) {
    super({
      writableObjectMode: true,
      readableObjectMode: false,
    });
  }

  private writeHeader(): void {
    if (this.headerWritten) return;
    this.headerWritten = true;
    if (this.ddl.length > 0) {
      this.push(`${this.ddl.join("\n")}\n`);
    }
  }

  _transform(
    chunk: DocumentEmission,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    this.writeHeader();
    const lines = chunk.statements.map(renderInsert);
    if (lines.length > 0) {
      this.push(`-- document ${chunk.documentId}\n${lines.join("\n")}\n`);
    }
    callback();
  }

  _flush(callback: TransformCallback): void {
    this.writeHeader();
    callback();
  }
}

export function createSqlScriptWriter(ddl: string[] = []): Transform {
  return new SqlScriptWriter(ddl);
}

/**
 * SQL script file fed with emissions as a conversion runs.
 * The file is opened before any work starts so a bad path fails early,
 * and writes wait for the file to drain.
 */
export class SqlScriptFile {
  private writer: Transform | null = null;
  private done: Promise<void> | null = null;
  private failure: unknown = null;

  private constructor(
    readonly path: string,
    private readonly file: WriteStream,
  ) {}

  /**
   * @throws FileIOError when the file cannot be created
   */
  static async open(path: string): Promise<SqlScriptFile> {
    try {
      const handle = await open(path, "w");
      return new SqlScriptFile(path, handle.createWriteStream({ encoding: "utf-8" }));
    } catch (error) {
      throw new FileIOError(`Cannot write SQL script ${path}`, { path }, { cause: error });
    }
  }

  /**
   * Start the script with the DDL; emissions may be written afterwards
   */
  start(ddl: string[]): Transform {
    if (this.writer) return this.writer;
    const writer = createSqlScriptWriter(ddl);
    this.writer = writer;
    this.done = pipelineAsync(writer, this.file).catch((error: unknown) => {
      this.fail(error);
    });
    return writer;
  }

  async write(emission: DocumentEmission): Promise<void> {
    const writer = this.writer ?? this.start([]);
    this.assertHealthy();
    if (!writer.write(emission)) {
      try {
        await Promise.race([once(writer, "drain"), this.done]);
      } catch (error) {
        this.fail(error);
      }
      this.assertHealthy();
    }
  }

  /**
   * Finish the script and wait until it is on disk
   *
   * @throws FileIOError when any write failed
   */
  async close(): Promise<void> {
    const writer = this.writer ?? this.start([]);
    writer.end();
    await this.done;
    this.assertHealthy();
  }

  /**
   * Stop writing after a failed conversion; the partial file is left as is
   */
  async abort(): Promise<void> {
    if (!this.writer) {
      this.file.destroy();
      return;
    }
    this.writer.destroy();
    await this.done;
  }

  private fail(error: unknown): void {
    if (this.failure === null) {
      this.failure = error;
    }
  }

  private assertHealthy(): void {
    if (this.failure !== null) {
      throw new FileIOError(`Failed to write SQL script ${this.path}`, { path: this.path }, {
        cause: this.failure,
      });
    }
  }
}
