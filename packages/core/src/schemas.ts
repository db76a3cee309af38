import { z } from 'zod';

const nonEmptyString = z.string().trim().min(1, 'Value must not be empty');
const urlSchema = z.string().url();

export const ItemSummarySchema = z
  .object({
    name: z.string(),
    price: z.string(),
    image: urlSchema.optional(),
    url: urlSchema.optional(),
    itemId: nonEmptyString.optional(),
    itemType: nonEmptyString.optional()
  })
  .strict();

export type ItemSummary = z.infer<typeof ItemSummarySchema>;

export const ItemDetailSchema = ItemSummarySchema.extend({
  description: z.string().optional(),
  condition: nonEmptyString.optional(),
  categories: z.array(nonEmptyString).readonly().optional(),
  images: z.array(urlSchema).readonly().optional(),
  sellerName: nonEmptyString.optional(),
  sellerRating: nonEmptyString.optional(),
  sellerRatingCount: nonEmptyString.optional()
}).strict();

export type ItemDetail = z.infer<typeof ItemDetailSchema>;

export const DETAIL_ONLY_FIELDS = [
  'description',
  'condition',
  'categories',
  'images',
  'sellerName',
  'sellerRating',
  'sellerRatingCount'
] as const satisfies readonly Exclude<keyof ItemDetail, keyof ItemSummary>[];

export const toItemSummary = (item: ItemSummary): ItemSummary => {
  const summary: ItemSummary = { name: item.name, price: item.price };
  if (item.image !== undefined) {
    summary.image = item.image;
  }
  if (item.url !== undefined) {
    summary.url = item.url;
  }
  if (item.itemId !== undefined) {
    summary.itemId = item.itemId;
  }
  if (item.itemType !== undefined) {
    summary.itemType = item.itemType;
  }
  return summary;
};

export const summaryOnlyDetail = (item: ItemSummary): ItemDetail => toItemSummary(item);

export const RecommendationResultSchema = z
  .object({
    message: z.string(),
    products: z.array(ItemDetailSchema).readonly()
  })
  .strict();

export type RecommendationResult = z.infer<typeof RecommendationResultSchema>;
