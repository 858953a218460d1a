export const FILE_CONTENT_TYPES = ['IMAGE', 'STATIC_FILE', 'LOGO', 'PRODUCT'] as const;
export type FileContentType = (typeof FILE_CONTENT_TYPES)[number];

/** Types that can be organised in folders. */
export const FOLDER_CONTENT_TYPES: readonly FileContentType[] = ['IMAGE', 'STATIC_FILE'];

export const PRODUCT_IMAGE_SIZES = ['SMALL', 'LARGE'] as const;
export type ProductImageSize = (typeof PRODUCT_IMAGE_SIZES)[number];

export const IMAGE_MIME_TYPES = ['image/jpeg', 'image/png', 'image/gif', 'image/webp'] as const;

export interface InputContentFile {
  fileName: string;
  mimeType: string;
  fileContentType: FileContentType;
  content: Buffer;
  /** Slash separated folder path below the type root. */
  folder?: string;
}

export interface OutputContentFile {
  fileName: string;
  mimeType: string;
  fileContentType: FileContentType;
  folder?: string;
  size: number;
  content: Buffer;
  url: string;
}

export function isFileContentType(value: string): value is FileContentType {
  return FILE_CONTENT_TYPES.some((type) => type === value);
}

export function isImageMimeType(value: string): boolean {
  return IMAGE_MIME_TYPES.some((type) => type === value);
}
