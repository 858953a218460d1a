import { Row } from '../../common/persistence/entity-repository';

/** Link between a product and one of its categories. */
export interface ProductCategory extends Row {
  ProductId: string;
  CategoryId: string;
}
