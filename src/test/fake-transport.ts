import type {
  ClipboardContentDto,
  ClipboardItemDto,
  ContentInsertedEventDto,
  PasteDetectedEventDto,
  WriteTempFileInputDto,
} from "@/contracts";
import type { PasteTransport } from "@/services/paste-transport";

type Handler<T> = (event: T) => void;

const encoder = new TextEncoder();

export const TEMP_DIR = "/tmp/paste-input";

export function textItemDto(text: string, mimeType = "text/plain"): ClipboardItemDto {
  return { data: Array.from(encoder.encode(text)), mimeType };
}

export function imageItemDto(bytes: number[], mimeType = "image/png"): ClipboardItemDto {
  return { data: bytes, mimeType };
}

export function contentDto(...items: ClipboardItemDto[]): ClipboardContentDto {
  return { items };
}

export class FakePasteTransport implements PasteTransport {
  clipboard: ClipboardContentDto = { items: [] };
  clipboardError: Error | null = null;
  plainText = "";
  plainTextError: Error | null = null;
  platformVersion = "test-os 1.0";
  platformVersionError: Error | null = null;
  writeError: Error | null = null;
  writeGate: Promise<void> | null = null;
  clearError: Error | null = null;
  clearCount = 0;
  clipboardReads = 0;
  readonly written: WriteTempFileInputDto[] = [];
  readonly contentUris = new Map<string, ClipboardItemDto>();
  private readonly pasteDetected = new Set<Handler<PasteDetectedEventDto>>();
  private readonly contentInserted = new Set<Handler<ContentInsertedEventDto>>();

  get pasteDetectedListenerCount(): number {
    return this.pasteDetected.size;
  }

  get contentInsertedListenerCount(): number {
    return this.contentInserted.size;
  }

  async getClipboardContent(): Promise<ClipboardContentDto> {
    this.clipboardReads += 1;
    if (this.clipboardError) {
      throw this.clipboardError;
    }
    return this.clipboard;
  }

  async getPlatformVersion(): Promise<string> {
    if (this.platformVersionError) {
      throw this.platformVersionError;
    }
    return this.platformVersion;
  }

  async clearTempFiles(): Promise<void> {
    if (this.clearError) {
      throw this.clearError;
    }
    this.clearCount += 1;
  }

  async writeTempFile(input: WriteTempFileInputDto): Promise<string> {
    if (this.writeGate) {
      await this.writeGate;
    }
    if (this.writeError) {
      throw this.writeError;
    }
    this.written.push(input);
    return `${TEMP_DIR}/${input.fileName}`;
  }

  async readContentUri(uri: string): Promise<ClipboardItemDto> {
    const item = this.contentUris.get(uri);
    if (!item) {
      throw new Error(`unknown content uri: ${uri}`);
    }
    return item;
  }

  async readPlainText(): Promise<string> {
    if (this.plainTextError) {
      throw this.plainTextError;
    }
    return this.plainText;
  }

  async listenPasteDetected(handler: Handler<PasteDetectedEventDto>): Promise<() => void> {
    this.pasteDetected.add(handler);
    return () => {
      this.pasteDetected.delete(handler);
    };
  }

  async listenContentInserted(handler: Handler<ContentInsertedEventDto>): Promise<() => void> {
    this.contentInserted.add(handler);
    return () => {
      this.contentInserted.delete(handler);
    };
  }

  emitPasteDetected(event: PasteDetectedEventDto): void {
    [...this.pasteDetected].forEach((handler) => handler(event));
  }

  emitContentInserted(event: ContentInsertedEventDto): void {
    [...this.contentInserted].forEach((handler) => handler(event));
  }
}

export function flushAsync(): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, 0));
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
