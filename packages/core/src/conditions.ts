import { z } from 'zod';

export const ITEM_CONDITION_IDS = ['1', '2', '3', '4', '5', '6'] as const;

export const ItemConditionIdSchema = z.enum(ITEM_CONDITION_IDS);

export type ItemConditionId = z.infer<typeof ItemConditionIdSchema>;

interface ItemConditionLabel {
  readonly id: ItemConditionId;
  readonly ja: string;
  readonly en: string;
}

export const ITEM_CONDITIONS: readonly ItemConditionLabel[] = [
  { id: '1', ja: '新品、未使用', en: 'New, unused' },
  { id: '2', ja: '未使用に近い', en: 'Nearly unused' },
  { id: '3', ja: '目立った傷や汚れなし', en: 'No noticeable scratches or stains' },
  { id: '4', ja: 'やや傷や汚れあり', en: 'Some scratches or stains' },
  { id: '5', ja: '傷や汚れあり', en: 'Scratches or stains' },
  { id: '6', ja: '全体的に状態が悪い', en: 'Poor overall condition' }
];

export const describeItemConditions = (): string =>
  ITEM_CONDITIONS.map((condition) => `${condition.id}=${condition.ja} (${condition.en})`).join(', ');
