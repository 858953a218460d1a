import { Row } from '../../common/persistence/entity-repository';

export interface Category extends Row {
  StoreId: string;
  Code: string;
  Name: string;
  Description: string | null;
  ParentId: string | null;
  /** `/` for a root, otherwise the parent's lineage followed by the parent id and `/`. */
  Lineage: string;
  Depth: number;
  SortOrder: number;
  Visible: boolean;
}

export interface ReadableCategory {
  id: string;
  code: string;
  name: string;
  description: string | null;
  parentId: string | null;
  lineage: string;
  depth: number;
  sortOrder: number;
  visible: boolean;
}

export interface CategoryNode extends ReadableCategory {
  children: CategoryNode[];
}
