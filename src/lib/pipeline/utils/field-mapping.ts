import type { AnalysisKind } from '../types';

export type ComparisonType = 'numeric' | 'string' | 'count';

export type FieldCorrespondence = {
  /** Path in the harvested field map; also the name reported in mismatches. */
  field: string;
  /** Path in the analysis result that should restate the harvested value. */
  resultPath: string;
  type: ComparisonType;
  /** Value the harvested side takes when the page carried nothing for the field. */
  absentAs?: number;
};

// Fixed, explicit correspondence tables. Never inferred from the data.
export const FIELD_MAPPINGS: Record<AnalysisKind, FieldCorrespondence[]> = {
  'single-item': [
    { field: 'product_name', resultPath: 'product_analysis.product_name', type: 'string' },
    { field: 'price.sale_price', resultPath: 'product_analysis.price_analysis.sale_price', type: 'numeric' },
    { field: 'price.original_price', resultPath: 'product_analysis.price_analysis.original_price', type: 'numeric' },
    { field: 'reviews.review_count', resultPath: 'product_analysis.review_analysis.review_count', type: 'numeric', absentAs: 0 },
    { field: 'images.detail_images', resultPath: 'product_analysis.image_analysis.image_count', type: 'count' }
  ],
  collection: [
    { field: 'shop_name', resultPath: 'shop_analysis.shop_name', type: 'string' },
    { field: 'records', resultPath: 'shop_analysis.product_count', type: 'count' }
  ]
};

/**
 * Harvested field behind each auto-checkable checklist item, used when the
 * checklist service does not name one on the item itself.
 */
export const CHECKLIST_BACKING_FIELDS: Record<string, string> = {
  item_001: 'product_name',
  item_003: 'images.thumbnail',
  item_004: 'images.detail_images',
  item_005: 'description',
  item_006: 'price.sale_price',
  item_006b: 'qpoint_info',
  item_007: 'price.original_price',
  item_009: 'shipping_info.shipping_fee',
  item_010: 'shipping_info.free_shipping_threshold',
  item_011: 'coupon_info.has_coupon',
  item_013: 'reviews.review_count',
  item_015: 'category'
};
