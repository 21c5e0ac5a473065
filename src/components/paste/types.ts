export interface PastedAttachment {
  id: string;
  mimeType: string;
  source: "bytes" | "file";
  data: Uint8Array | null;
  uri: string | null;
  createdAt: number;
}
