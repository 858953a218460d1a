import { ValidationException } from '../common/errors/service.exception';
import { FileContentType, ProductImageSize } from './file-content-type';

/** Zero-byte object that makes an empty folder visible to listings. */
export const FOLDER_MARKER = '.folder';

const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/;
const MAX_SEGMENT_LENGTH = 255;

export function assertSegment(value: string, label: string): string {
  if (
    value.length === 0 ||
    value.length > MAX_SEGMENT_LENGTH ||
    value === '.' ||
    value === '..' ||
    value === FOLDER_MARKER ||
    value.includes('/') ||
    value.includes('\\') ||
    CONTROL_CHARACTERS.test(value)
  ) {
    throw new ValidationException(`Invalid ${label}: "${value}"`);
  }
  return value;
}

export function folderSegments(folder?: string): string[] {
  if (folder === undefined) {
    return [];
  }
  const trimmed = folder.replace(/^\/+|\/+$/g, '');
  if (trimmed.length === 0) {
    return [];
  }
  return trimmed.split('/').map((segment) => assertSegment(segment, 'folder name'));
}

export function storePrefix(storeCode: string): string {
  return `${assertSegment(storeCode, 'store code')}/`;
}

export function typePrefix(storeCode: string, type: FileContentType, folders: string[] = []): string {
  return `${storePrefix(storeCode)}${[type, ...folders].join('/')}/`;
}

export function fileKey(storeCode: string, type: FileContentType, fileName: string, folders: string[] = []): string {
  return `${typePrefix(storeCode, type, folders)}${assertSegment(fileName, 'file name')}`;
}

export function folderMarkerKey(storeCode: string, type: FileContentType, folders: string[]): string {
  return `${typePrefix(storeCode, type, folders)}${FOLDER_MARKER}`;
}

export function productPrefix(storeCode: string, sku: string): string {
  return typePrefix(storeCode, 'PRODUCT', [assertSegment(sku, 'sku')]);
}

export function productImageKey(storeCode: string, sku: string, size: ProductImageSize, fileName: string): string {
  return `${productPrefix(storeCode, sku)}${size}/${assertSegment(fileName, 'file name')}`;
}
