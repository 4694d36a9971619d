import { z } from 'zod';

/**
 * Language subdomain code: letters and hyphens, at least two characters
 */
export const LanguageCodeSchema = z
  .string()
  .regex(/^[A-Za-z-]{2,}$/, 'Language code must be letters or hyphens, at least 2 characters')
  .describe('Language code, e.g. "en" or "zh-yue"');

/**
 * Body of PUT /api/feed/settings
 */
export const FeedSettingsUpdateSchema = z
  .object({
    languageCode: LanguageCodeSchema.optional(),
    topics: z.array(z.string().min(1)).max(20).optional(),
  })
  .refine(body => body.languageCode !== undefined || body.topics !== undefined, {
    message: 'Provide languageCode or topics',
  });

export type FeedSettingsUpdate = z.infer<typeof FeedSettingsUpdateSchema>;

// Wikipedia Action API (formatversion=2) payloads

export const CategoryMembersResponseSchema = z.object({
  query: z
    .object({
      categorymembers: z.array(
        z.object({
          pageid: z.number().int(),
          ns: z.number().int(),
          title: z.string(),
        })
      ),
    })
    .optional(),
});

export const SearchResponseSchema = z.object({
  query: z
    .object({
      search: z.array(
        z.object({
          pageid: z.number().int(),
          title: z.string(),
        })
      ),
    })
    .optional(),
});

/**
 * Pages are validated one by one so a malformed record only drops itself.
 */
export const PageDetailsResponseSchema = z.object({
  query: z
    .object({
      pages: z.array(z.unknown()),
    })
    .optional(),
});

export const WikiPageSchema = z.object({
  pageid: z.number().int().positive(),
  title: z.string().min(1),
  extract: z.string().default(''),
  fullurl: z.string().url(),
  thumbnail: z
    .object({
      source: z.string().url(),
      width: z.number().int().optional(),
      height: z.number().int().optional(),
    })
    .optional(),
});

export type WikiPage = z.infer<typeof WikiPageSchema>;
