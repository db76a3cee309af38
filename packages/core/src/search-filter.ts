import { z } from 'zod';

import { ItemConditionIdSchema } from './conditions.js';

export const SEARCH_SORTS = ['SORT_CREATED_TIME', 'SORT_SCORE', 'SORT_PRICE', 'SORT_NUM_LIKES'] as const;
export const SEARCH_ORDERS = ['ORDER_DESC', 'ORDER_ASC'] as const;

export const SearchSortSchema = z.enum(SEARCH_SORTS);
export const SearchOrderSchema = z.enum(SEARCH_ORDERS);

export type SearchSort = z.infer<typeof SearchSortSchema>;
export type SearchOrder = z.infer<typeof SearchOrderSchema>;

const priceSchema = z.number().int().positive();
const codeSetSchema = <T extends z.ZodTypeAny>(entry: T) => z.array(entry).min(1).readonly();

export const SearchFilterSchema = z
  .object({
    keyword: z.string().trim().min(1, 'keyword is required'),
    excludeKeyword: z.string().trim().min(1).optional(),
    sort: SearchSortSchema.optional(),
    order: SearchOrderSchema.optional(),
    priceMin: priceSchema.optional(),
    priceMax: priceSchema.optional(),
    itemConditionId: codeSetSchema(ItemConditionIdSchema).optional(),
    categoryId: codeSetSchema(z.string().trim().min(1)).optional()
  })
  .strict();

export type SearchFilter = z.infer<typeof SearchFilterSchema>;

type OptionalFilterField = Exclude<keyof SearchFilter, 'keyword'>;

export type SearchArgumentsDecodeResult =
  | {
      readonly ok: true;
      readonly filter: SearchFilter;
      readonly droppedFields: readonly string[];
    }
  | {
      readonly ok: false;
      readonly reason: string;
      readonly droppedFields: readonly string[];
    };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toPrice = (value: unknown): number | undefined => {
  const candidate = typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value.trim()) : value;
  const parsed = priceSchema.safeParse(candidate);
  return parsed.success ? parsed.data : undefined;
};

const toCodeList = (value: unknown): string[] | undefined => {
  const entries = Array.isArray(value) ? value : [value];
  const codes = entries
    .filter((entry): entry is string | number => typeof entry === 'string' || typeof entry === 'number')
    .map((entry) => String(entry).trim())
    .filter((entry) => entry.length > 0);
  const unique = [...new Set(codes)];
  return unique.length > 0 ? unique : undefined;
};

const FIELD_DECODERS: { readonly [K in OptionalFilterField]: (value: unknown) => SearchFilter[K] | undefined } = {
  excludeKeyword: (value) => {
    const parsed = SearchFilterSchema.shape.excludeKeyword.safeParse(value);
    return parsed.success ? parsed.data : undefined;
  },
  sort: (value) => {
    const parsed = SearchSortSchema.safeParse(value);
    return parsed.success ? parsed.data : undefined;
  },
  order: (value) => {
    const parsed = SearchOrderSchema.safeParse(value);
    return parsed.success ? parsed.data : undefined;
  },
  priceMin: toPrice,
  priceMax: toPrice,
  itemConditionId: (value) => {
    const codes = toCodeList(value)?.filter(
      (code): code is z.infer<typeof ItemConditionIdSchema> => ItemConditionIdSchema.safeParse(code).success
    );
    return codes && codes.length > 0 ? codes : undefined;
  },
  categoryId: toCodeList
};

const OPTIONAL_FIELDS: readonly OptionalFilterField[] = [
  'excludeKeyword',
  'sort',
  'order',
  'priceMin',
  'priceMax',
  'itemConditionId',
  'categoryId'
];

const KNOWN_FIELDS: ReadonlySet<string> = new Set(['keyword', ...OPTIONAL_FIELDS]);

const assignField = <K extends OptionalFilterField>(
  filter: SearchFilter,
  field: K,
  value: SearchFilter[K] | undefined
): boolean => {
  if (value === undefined) {
    return false;
  }
  filter[field] = value;
  return true;
};

/**
 * Decodes tool-call arguments into a filter. Every optional field that is
 * missing, null or unusable is left unset; only a missing keyword fails.
 */
export const decodeSearchArguments = (raw: unknown): SearchArgumentsDecodeResult => {
  let payload: unknown = raw;
  if (typeof raw === 'string') {
    try {
      payload = JSON.parse(raw);
    } catch {
      return { ok: false, reason: 'Search arguments are not valid JSON.', droppedFields: [] };
    }
  }

  if (!isRecord(payload)) {
    return { ok: false, reason: 'Search arguments must be a JSON object.', droppedFields: [] };
  }

  const droppedFields = Object.keys(payload).filter((key) => !KNOWN_FIELDS.has(key));

  const keyword = SearchFilterSchema.shape.keyword.safeParse(payload.keyword);
  if (!keyword.success) {
    return { ok: false, reason: 'keyword is required', droppedFields };
  }

  const filter: SearchFilter = { keyword: keyword.data };
  for (const field of OPTIONAL_FIELDS) {
    const value = payload[field];
    if (value === undefined || value === null) {
      continue;
    }
    if (!assignField(filter, field, FIELD_DECODERS[field](value))) {
      droppedFields.push(field);
    }
  }

  return { ok: true, filter, droppedFields };
};

const SORT_PARAMS: Record<SearchSort, string> = {
  SORT_CREATED_TIME: 'created_time',
  SORT_SCORE: 'score',
  SORT_PRICE: 'price',
  SORT_NUM_LIKES: 'num_likes'
};

const ORDER_PARAMS: Record<SearchOrder, string> = {
  ORDER_DESC: 'desc',
  ORDER_ASC: 'asc'
};

export const serializeSearchFilter = (filter: SearchFilter): URLSearchParams => {
  const params = new URLSearchParams();
  params.set('keyword', filter.keyword);

  if (filter.excludeKeyword) {
    params.set('exclude_keyword', filter.excludeKeyword);
  }
  if (filter.sort) {
    params.set('sort', SORT_PARAMS[filter.sort]);
  }
  if (filter.order) {
    params.set('order', ORDER_PARAMS[filter.order]);
  }
  if (filter.priceMin !== undefined && filter.priceMin > 0) {
    params.set('price_min', String(filter.priceMin));
  }
  if (filter.priceMax !== undefined && filter.priceMax > 0) {
    params.set('price_max', String(filter.priceMax));
  }
  if (filter.itemConditionId && filter.itemConditionId.length > 0) {
    params.set('item_condition_id', filter.itemConditionId.join(','));
  }
  if (filter.categoryId && filter.categoryId.length > 0) {
    params.set('category_id', filter.categoryId.join(','));
  }

  return params;
};

export const DEFAULT_MARKETPLACE_ORIGIN = 'https://jp.mercari.com';

export const buildSearchUrl = (filter: SearchFilter, origin: string = DEFAULT_MARKETPLACE_ORIGIN): string => {
  const url = new URL('/search', origin);
  url.search = serializeSearchFilter(filter).toString();
  return url.toString();
};
