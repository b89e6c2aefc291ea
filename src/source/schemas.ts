import { z } from 'zod';

// Presence checks only: anything not read below passes through untouched.

// Null and missing both fall back to the empty value.
const text = z
  .string()
  .nullish()
  .transform((v) => v ?? '');

const OwnerSchema = z.object({
  name: text,
  mid: z
    .number()
    .nullish()
    .transform((v) => v ?? 0),
  face: text,
});

export const RawListItemSchema = z.object({
  bvid: z.string().min(1),
  title: text,
  desc: text,
  pic: text,
  pub_location: text,
  short_link_v2: text,
  first_frame: text,
  owner: OwnerSchema.nullish().transform((o) => o ?? { name: '', mid: 0, face: '' }),
});

export type RawListItem = z.infer<typeof RawListItemSchema>;

/** Entries are checked one by one in the listing, so a bad entry stays local. */
export const PopularEnvelopeSchema = z.object({
  code: z.number(),
  message: z.string().default(''),
  data: z
    .object({
      list: z.array(z.unknown()).nullish(),
    })
    .nullish(),
});

const optionalCount = z.number().nonnegative().optional().catch(undefined);

export const ViewEnvelopeSchema = z.object({
  code: z.number(),
  message: z.string().default(''),
  data: z
    .object({
      stat: z
        .object({
          view: optionalCount,
          danmaku: optionalCount,
          like: optionalCount,
          coin: optionalCount,
          favorite: optionalCount,
          share: optionalCount,
          reply: optionalCount,
        })
        .default({}),
      duration: optionalCount,
      pubdate: optionalCount,
      cid: z.number().optional().catch(undefined),
      tname: z.string().optional().catch(undefined),
      category_name: z.string().optional().catch(undefined),
    })
    .nullish(),
});
