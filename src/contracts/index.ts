// 前端与宿主插件之间的线上结构，字节统一以 number[] 传输
export interface ClipboardItemDto {
  data: number[];
  mimeType: string;
}

export interface ClipboardContentDto {
  items: ClipboardItemDto[];
}

export interface PasteDetectedEventDto {
  content: ClipboardContentDto;
  viewId: number | null;
}

export interface ContentInsertedEventDto {
  viewId: number | null;
  mimeType: string;
  data: number[] | null;
  uri: string | null;
}

export interface WriteTempFileInputDto {
  fileName: string;
  data: number[];
}

export interface InvokeErrorContextItemDto {
  key: string;
  value: string;
}

export interface InvokeErrorPayloadDto {
  code?: string;
  message?: string;
  causes?: string[];
  context?: InvokeErrorContextItemDto[];
  requestId?: string;
}
