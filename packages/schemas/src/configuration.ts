import { z } from 'zod';

const selector = z.string().trim().min(1, 'selector must not be empty');

export const searchInteractionSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('none') }),
  z.object({ mode: z.literal('button'), selector }),
  z.object({
    mode: z.literal('query'),
    inputSelector: selector,
    query: z.string().trim().min(1, 'query must not be empty'),
    submitSelector: selector.optional(),
  }),
]);
export type SearchInteraction = z.infer<typeof searchInteractionSchema>;

/** Field selectors, each scoped relative to one list item. */
export const fieldSelectorsSchema = z.object({
  title: selector,
  url: selector,
  description: selector.optional(),
  location: selector.optional(),
  postedDate: selector.optional(),
});
export type FieldSelectors = z.infer<typeof fieldSelectorsSchema>;

export const scrapingConfigurationSchema = z.object({
  listItemSelector: selector,
  fields: fieldSelectorsSchema,
  paginationSelector: selector.optional(),
  search: searchInteractionSchema,
  keywordFilter: z.array(z.string().trim().toLowerCase().min(1)),
});
export type ScrapingConfiguration = z.infer<typeof scrapingConfigurationSchema>;

/**
 * Flat configuration shape as produced by the oracle or an operator.
 * Search modes are expressed as independent fields here, so both can be set;
 * parseScrapingConfiguration rejects that combination.
 */
export const scrapingConfigurationInputSchema = z.object({
  listItemSelector: z.string(),
  titleSelector: z.string(),
  urlSelector: z.string(),
  descriptionSelector: z.string().nullish(),
  locationSelector: z.string().nullish(),
  postedDateSelector: z.string().nullish(),
  paginationSelector: z.string().nullish(),
  searchButtonSelector: z.string().nullish(),
  searchInputSelector: z.string().nullish(),
  searchQuery: z.string().nullish(),
  searchSubmitSelector: z.string().nullish(),
  keywordFilter: z.union([z.string(), z.array(z.string())]).nullish(),
});
export type ScrapingConfigurationInput = z.infer<typeof scrapingConfigurationInputSchema>;

export type ConfigurationParseResult =
  | { success: true; data: ScrapingConfiguration }
  | { success: false; error: string };

function present(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Split a keyword filter into lowercase terms.
 * Accepts "intern,co-op" or ["Intern", "co-op"]; blanks and repeats are dropped.
 */
export function splitKeywordFilter(value: string | readonly string[] | null | undefined): string[] {
  const parts = typeof value === 'string' ? value.split(',') : (value ?? []);
  const terms: string[] = [];
  for (const part of parts) {
    const term = part.trim().toLowerCase();
    if (term && !terms.includes(term)) terms.push(term);
  }
  return terms;
}

export function resolveSearchInteraction(
  input: Pick<
    ScrapingConfigurationInput,
    'searchButtonSelector' | 'searchInputSelector' | 'searchQuery' | 'searchSubmitSelector'
  >,
): { success: true; data: SearchInteraction } | { success: false; error: string } {
  const button = present(input.searchButtonSelector);
  const field = present(input.searchInputSelector);
  const query = present(input.searchQuery);
  const submit = present(input.searchSubmitSelector);
  const typed = field !== undefined || query !== undefined;

  if (button && typed) {
    return {
      success: false,
      error: 'search interaction sets both button-only and typed-query modes',
    };
  }
  if (typed) {
    if (!field || !query) {
      return {
        success: false,
        error: 'typed-query search needs both an input selector and a query',
      };
    }
    return {
      success: true,
      data: submit
        ? { mode: 'query', inputSelector: field, query, submitSelector: submit }
        : { mode: 'query', inputSelector: field, query },
    };
  }
  if (submit) {
    return { success: false, error: 'search submit selector given without a typed query' };
  }
  if (button) return { success: true, data: { mode: 'button', selector: button } };
  return { success: true, data: { mode: 'none' } };
}

/**
 * Build a ScrapingConfiguration from its flat form. Never throws.
 */
export function parseScrapingConfiguration(input: unknown): ConfigurationParseResult {
  const loose = scrapingConfigurationInputSchema.safeParse(input);
  if (!loose.success) {
    return { success: false, error: formatIssues(loose.error) };
  }

  const flat = loose.data;
  const search = resolveSearchInteraction(flat);
  if (!search.success) return search;

  const candidate = {
    listItemSelector: flat.listItemSelector,
    fields: {
      title: flat.titleSelector,
      url: flat.urlSelector,
      description: present(flat.descriptionSelector),
      location: present(flat.locationSelector),
      postedDate: present(flat.postedDateSelector),
    },
    paginationSelector: present(flat.paginationSelector),
    search: search.data,
    keywordFilter: splitKeywordFilter(flat.keywordFilter),
  };

  const strict = scrapingConfigurationSchema.safeParse(candidate);
  if (!strict.success) {
    return { success: false, error: formatIssues(strict.error) };
  }
  return { success: true, data: strict.data };
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
