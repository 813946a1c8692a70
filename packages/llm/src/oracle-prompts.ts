/**
 * Prompt templates for the three oracle operations.
 */

import { createPromptTemplate } from './prompts.js';

export const RANK_TEMPLATE = createPromptTemplate(
  `Search query: {query}

Candidate URLs:
{candidates}

Order the candidates by how likely each one is to be, or to lead directly to, the official
job listings page for the company in the query. Prefer the company's own careers pages and
its applicant tracking system boards over news, aggregators and social networks.

Return JSON: {"ranked": [<candidate numbers, best first>]}`,
  {
    system:
      'You rank search results for a job-board crawler. Answer with JSON only, using the candidate numbers given.',
  },
);

export const NAVIGATE_TEMPLATE = createPromptTemplate(
  `Current page: {url}
Title: {title}

Visible text (truncated):
{text}

Links on this page:
{links}

Decide whether the current page already lists individual job openings (titles of open
positions, ideally with links to each posting). If it does, answer STAY. If it does not but
one of the numbered links is likely to lead to the job listings, answer LEAVE with that
link's number. If none of the links helps, answer LEAVE with link 0.

Return JSON: {"decision": "STAY" | "LEAVE", "link": <number or null>, "reason": "<short>"}`,
  {
    system:
      'You guide a browser towards a company job board one page at a time. Answer with JSON only.',
  },
);

export const SYNTHESIZE_TEMPLATE = createPromptTemplate(
  `Job board URL: {url}

Cleaned HTML of the job board:
{html}
{feedback}
Write CSS selectors that extract every job posting from this page.
- list_item_selector matches one element per job posting.
- title_selector, url_selector, description_selector, location_selector and
  posted_date_selector are relative to one list item. url_selector must match an element
  with an href (usually an <a>). Use null for fields the page does not show.
- pagination_selector matches the "next page" control, or null when there is none.
- If the listings only appear after a search, give either search_button_selector (a button
  that reveals all jobs) or search_input_selector plus search_query (and optionally
  search_submit_selector). Never both.
- keyword_filter lists lowercase words a job title or description must contain, or null.

Return JSON with exactly these keys:
{"status": "ok", "list_item_selector": "", "title_selector": "", "url_selector": "",
 "description_selector": null, "location_selector": null, "posted_date_selector": null,
 "pagination_selector": null, "search_button_selector": null, "search_input_selector": null,
 "search_query": null, "search_submit_selector": null, "keyword_filter": null}

If the page contains no job listings at all, return {"status": "refused", "reason": "<why>"}.`,
  {
    system:
      'You are a precise web scraping engineer. You only use selectors that exist in the HTML you are given. Answer with JSON only.',
  },
);

export const FEEDBACK_TEMPLATE = createPromptTemplate(`
Previous attempt {attempt} failed.
Error: {error}
Configuration that failed:
{previous}
Fix the selectors so that they match the job postings in the HTML above.
`);
