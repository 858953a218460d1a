export const Tables = {
  MerchantStores: 'MerchantStores',
  Categories: 'Categories',
  Products: 'Products',
  ProductCategories: 'ProductCategories',
  ProductImages: 'ProductImages',
  ProductOptions: 'ProductOptions',
  ProductOptionValues: 'ProductOptionValues',
  ProductVariations: 'ProductVariations',
  ProductVariants: 'ProductVariants',
  ShoppingCarts: 'ShoppingCarts',
  ShoppingCartItems: 'ShoppingCartItems',
  ShippingConfigurations: 'ShippingConfigurations',
  PaymentConfigurations: 'PaymentConfigurations',
  Orders: 'Orders',
  OrderProducts: 'OrderProducts',
  OrderTotals: 'OrderTotals',
  OrderStatusHistory: 'OrderStatusHistory',
  Transactions: 'Transactions',
  Contents: 'Contents',
  ActivityLogs: 'ActivityLogs',
} as const;

export type TableName = (typeof Tables)[keyof typeof Tables];

/**
 * Unique constraints declared in the schema migration. The in-memory backend
 * enforces the same sets so both backends reject the same inserts.
 */
export const UNIQUE_KEYS: Record<TableName, string[][]> = {
  MerchantStores: [['Code']],
  Categories: [['StoreId', 'Code']],
  Products: [['StoreId', 'Sku']],
  ProductCategories: [['ProductId', 'CategoryId']],
  ProductImages: [['ProductId', 'FileName']],
  ProductOptions: [['StoreId', 'Code']],
  ProductOptionValues: [['StoreId', 'Code']],
  ProductVariations: [['StoreId', 'Code'], ['StoreId', 'OptionId', 'OptionValueId']],
  ProductVariants: [['StoreId', 'Sku'], ['ProductId', 'VariationId', 'VariationValueId']],
  ShoppingCarts: [['Code']],
  ShoppingCartItems: [],
  ShippingConfigurations: [['StoreId']],
  PaymentConfigurations: [['StoreId', 'ModuleCode']],
  Orders: [],
  OrderProducts: [],
  OrderTotals: [['OrderId', 'Code']],
  OrderStatusHistory: [],
  Transactions: [],
  Contents: [['StoreId', 'Code']],
  ActivityLogs: [],
};
