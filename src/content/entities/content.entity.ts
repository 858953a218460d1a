import { Row } from '../../common/persistence/entity-repository';
import { FileContentType } from '../../cms/file-content-type';

export const CONTENT_TYPES = ['PAGE', 'BOX', 'SECTION'] as const;
export type ContentType = (typeof CONTENT_TYPES)[number];

export interface Content extends Row {
  StoreId: string;
  Code: string;
  ContentType: ContentType;
  Title: string;
  /** Only pages have a slug; unique per store. */
  Slug: string | null;
  Body: string;
  MetaDescription: string | null;
  Visible: boolean;
  LinkToMenu: boolean;
  SortOrder: number;
}

export interface ReadableContent {
  id: string;
  code: string;
  contentType: ContentType;
  title: string;
  slug: string | null;
  body: string;
  metaDescription: string | null;
  visible: boolean;
  linkToMenu: boolean;
  sortOrder: number;
}

export interface ReadableContentFile {
  fileName: string;
  mimeType: string;
  fileContentType: FileContentType;
  folder: string | null;
  size: number;
  url: string;
}
