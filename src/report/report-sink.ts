import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';

/** Destination for report blocks. Each `write` call is one complete block. */
export interface ReportSink {
  write(block: string): Promise<void>;
  close(): Promise<void>;
}

// CSI sequences: ESC [ ... final_byte
// eslint-disable-next-line no-control-regex
const CSI_REGEX = /[\u001b\u009b][[()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[@-~]/g;
// OSC sequences: ESC ] ... (BEL | ESC \)
// eslint-disable-next-line no-control-regex
const OSC_REGEX = /\u001b\][\s\S]*?(?:\u0007|\u001b\\)/g;
// DCS, PM, APC sequences: ESC (P|^|_) ... ESC \
// eslint-disable-next-line no-control-regex
const DCS_PM_APC_REGEX = /\u001b[P^_][\s\S]*?\u001b\\/g;
// eslint-disable-next-line no-control-regex
const C0_CONTROL_REGEX = /[\x00-\x08\x0B-\x0C\x0E-\x1F\r]/g;

/** Strip terminal escape and control sequences from model output. */
export function sanitize(text: string): string {
  return text
    .replace(OSC_REGEX, '')
    .replace(DCS_PM_APC_REGEX, '')
    .replace(CSI_REGEX, '')
    .replace(C0_CONTROL_REGEX, '');
}

export class ConsoleReportSink implements ReportSink {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  async write(block: string): Promise<void> {
    const text = sanitize(block);
    await new Promise<void>((resolve, reject) => {
      this.stream.write(text, (err?: Error | null) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  async close(): Promise<void> {}
}

export class FileReportSink implements ReportSink {
  private handle: FileHandle | null = null;

  private constructor(readonly filePath: string) {}

  /** Truncates any existing file at `filePath`. */
  static async create(filePath: string): Promise<FileReportSink> {
    const sink = new FileReportSink(filePath);
    sink.handle = await open(filePath, 'w');
    return sink;
  }

  async write(block: string): Promise<void> {
    if (!this.handle) {
      throw new Error(`Report file ${this.filePath} is already closed`);
    }
    await this.handle.write(block);
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    await handle?.close();
  }
}
