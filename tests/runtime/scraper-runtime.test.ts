import { describe, it, expect } from 'vitest';
import {
  collectScrape,
  createScrapingConfiguration,
  runScraper,
  categorizeTermination,
} from '@boardscout/agents';
import { InvalidConfigurationError, PageTimeoutError, RuntimeFailureError } from '@boardscout/core';
import type { ScrapingConfiguration } from '@boardscout/schemas';
import { FakeBrowserDriver, listingPage } from '../support/fake-browser';
import { rowConfiguration } from '../support/fake-oracle';

const BOARD = 'https://acme.example/careers';
const PAGE_2 = 'https://acme.example/careers?page=2';

const config = (overrides = {}): ScrapingConfiguration =>
  createScrapingConfiguration(rowConfiguration(overrides));

describe('scraper-runtime', () => {
  it('drops candidates missing a title or url', async () => {
    const driver = new FakeBrowserDriver({
      pages: {
        [BOARD]: listingPage([
          { title: 'Platform Engineer', href: '/jobs/1' },
          { title: '', href: '/jobs/2' },
          { title: 'No Link' },
        ]),
      },
    });

    const { records, termination } = await collectScrape(runScraper(driver, config(), BOARD));

    expect(records.map((r) => r.url)).toEqual(['https://acme.example/jobs/1']);
    expect(records[0]?.title).toBe('Platform Engineer');
    expect(termination.droppedMalformed).toBe(2);
    expect(termination.reason).toBe('NO_NEXT_CONTROL');
    expect(termination.category).toBe('NO_MORE_JOBS');
  });

  it('collapses whitespace in text fields', async () => {
    const driver = new FakeBrowserDriver({
      pages: {
        [BOARD]: listingPage([
          { title: '  Data\n   Analyst ', href: '/jobs/7', location: ' Austin,\n TX ' },
        ]),
      },
    });

    const { records } = await collectScrape(runScraper(driver, config(), BOARD));

    expect(records[0]?.title).toBe('Data Analyst');
    expect(records[0]?.location).toBe('Austin, TX');
  });

  it('applies the keyword filter as a case-insensitive OR', async () => {
    const driver = new FakeBrowserDriver({
      pages: {
        [BOARD]: listingPage([
          { title: 'Senior Engineer', href: '/jobs/1', description: 'Build payment systems' },
          { title: 'Summer Intern', href: '/jobs/2', description: 'Ten weeks' },
          { title: 'Software Student', href: '/jobs/3', description: 'A CO-OP placement' },
        ]),
      },
    });

    const { records, termination } = await collectScrape(
      runScraper(driver, config({ keywordFilter: 'intern,co-op' }), BOARD),
    );

    expect(records.map((r) => r.title)).toEqual(['Summer Intern', 'Software Student']);
    expect(termination.droppedByFilter).toBe(1);
  });

  it('stops after a page that repeats the previous one', async () => {
    const jobs = [
      { title: 'Engineer', href: '/jobs/1' },
      { title: 'Designer', href: '/jobs/2' },
    ];
    const driver = new FakeBrowserDriver({
      pages: {
        [BOARD]: listingPage(jobs, { href: '?page=2' }),
        [PAGE_2]: listingPage(jobs, { href: '?page=3' }),
      },
      transitions: { [BOARD]: { 'a.next': PAGE_2 } },
    });

    const { records, termination } = await collectScrape(
      runScraper(driver, config({ paginationSelector: 'a.next' }), BOARD),
    );

    expect(records).toHaveLength(2);
    expect(termination.reason).toBe('DUPLICATE_RATIO');
    expect(termination.pagesVisited).toBe(2);
  });

  it('follows pagination until the next control is missing', async () => {
    const driver = new FakeBrowserDriver({
      pages: {
        [BOARD]: listingPage([{ title: 'Engineer', href: '/jobs/1' }], { href: '?page=2' }),
        [PAGE_2]: listingPage([{ title: 'Designer', href: '/jobs/2' }]),
      },
      transitions: { [BOARD]: { 'a.next': PAGE_2 } },
    });

    const { records, termination } = await collectScrape(
      runScraper(driver, config({ paginationSelector: 'a.next' }), BOARD),
    );

    expect(records.map((r) => r.url)).toEqual([
      'https://acme.example/jobs/1',
      'https://acme.example/jobs/2',
    ]);
    expect(termination.reason).toBe('NO_NEXT_CONTROL');
  });

  it('treats a disabled next control as the last page', async () => {
    const driver = new FakeBrowserDriver({
      pages: {
        [BOARD]: listingPage([{ title: 'Engineer', href: '/jobs/1' }], { className: 'next disabled' }),
      },
    });

    const { termination } = await collectScrape(
      runScraper(driver, config({ paginationSelector: 'a.next' }), BOARD),
    );

    expect(termination.reason).toBe('NEXT_CONTROL_DISABLED');
    expect(driver.actions).toEqual([`open ${BOARD}`]);
  });

  it('treats a next control inside an aria-disabled wrapper as disabled', async () => {
    const driver = new FakeBrowserDriver({
      pages: {
        [BOARD]: listingPage([{ title: 'Engineer', href: '/jobs/1' }], {
          parentAttrs: 'aria-disabled="true"',
        }),
      },
    });

    const { termination } = await collectScrape(
      runScraper(driver, config({ paginationSelector: 'a.next' }), BOARD),
    );

    expect(termination.reason).toBe('NEXT_CONTROL_DISABLED');
  });

  it('stops at the page limit', async () => {
    const driver = new FakeBrowserDriver({
      pages: { [BOARD]: listingPage([{ title: 'Engineer', href: '/jobs/1' }], { href: '?page=2' }) },
    });

    const { termination } = await collectScrape(
      runScraper(driver, config({ paginationSelector: 'a.next' }), BOARD, { maxPages: 1 }),
    );

    expect(termination.reason).toBe('PAGE_LIMIT');
    expect(termination.category).toBe('BUDGET');
  });

  it('reports an empty first page as selector drift', async () => {
    const driver = new FakeBrowserDriver({
      pages: { [BOARD]: '<html><body><p>We are not hiring right now.</p></body></html>' },
    });

    const { records, termination } = await collectScrape(runScraper(driver, config(), BOARD));

    expect(records).toEqual([]);
    expect(termination.reason).toBe('EMPTY_PAGE');
    expect(termination.category).toBe('SELECTOR_DRIFT');
  });

  it('never yields URLs already persisted', async () => {
    const driver = new FakeBrowserDriver({
      pages: {
        [BOARD]: listingPage([
          { title: 'Engineer', href: '/jobs/1' },
          { title: 'Designer', href: '/jobs/2' },
          { title: 'Recruiter', href: '/jobs/3' },
        ]),
      },
    });

    const { records, termination } = await collectScrape(
      runScraper(driver, config(), BOARD, { knownUrls: ['https://acme.example/jobs/1'] }),
    );

    expect(records.map((r) => r.title)).toEqual(['Designer', 'Recruiter']);
    expect(termination.reason).toBe('NO_NEXT_CONTROL');
  });

  it('clicks the search button before extracting', async () => {
    const results = 'https://acme.example/careers/all';
    const driver = new FakeBrowserDriver({
      pages: {
        [BOARD]: '<html><body><button id="show-all">Show all jobs</button></body></html>',
        [results]: listingPage([{ title: 'Engineer', href: '/jobs/1' }]),
      },
      transitions: { [BOARD]: { '#show-all': results } },
    });

    const { records } = await collectScrape(
      runScraper(driver, config({ searchButtonSelector: '#show-all' }), BOARD),
    );

    expect(driver.actions).toEqual([`open ${BOARD}`, 'click #show-all']);
    expect(records).toHaveLength(1);
  });

  it('types the query and presses Enter when no submit selector is given', async () => {
    const results = 'https://acme.example/careers?q=engineer';
    const driver = new FakeBrowserDriver({
      pages: {
        [BOARD]: '<html><body><input id="q" name="q"></body></html>',
        [results]: listingPage([{ title: 'Engineer', href: '/jobs/1' }]),
      },
      transitions: { [BOARD]: { 'enter:#q': results } },
    });

    const { records } = await collectScrape(
      runScraper(
        driver,
        config({ searchInputSelector: '#q', searchQuery: 'engineer' }),
        BOARD,
      ),
    );

    expect(driver.actions).toEqual([`open ${BOARD}`, 'fill #q=engineer', 'enter #q']);
    expect(records[0]?.url).toBe('https://acme.example/jobs/1');
  });

  it('ends a scheduled run quietly when a page times out', async () => {
    const driver = new FakeBrowserDriver({
      pages: {
        [BOARD]: listingPage([{ title: 'Engineer', href: '/jobs/1' }], { href: '?page=2' }),
        [PAGE_2]: listingPage([]),
      },
      transitions: { [BOARD]: { 'a.next': PAGE_2 } },
      timeouts: [PAGE_2],
    });

    const { records, termination } = await collectScrape(
      runScraper(driver, config({ paginationSelector: 'a.next' }), BOARD, { mode: 'scheduled' }),
    );

    expect(records).toHaveLength(1);
    expect(termination.reason).toBe('PAGE_TIMEOUT');
    expect(termination.category).toBe('TIMEOUT');
  });

  it('rethrows page timeouts in validation mode', async () => {
    const driver = new FakeBrowserDriver({ pages: { [BOARD]: '' }, timeouts: [BOARD] });

    await expect(
      collectScrape(runScraper(driver, config(), BOARD, { mode: 'validation' })),
    ).rejects.toBeInstanceOf(PageTimeoutError);
  });

  it('rejects an invalid configuration before navigating', () => {
    const driver = new FakeBrowserDriver({ pages: {} });
    const broken = { ...config(), listItemSelector: '  ' };

    expect(() => runScraper(driver, broken, BOARD)).toThrow(InvalidConfigurationError);
    expect(driver.actions).toEqual([]);
  });

  it('can only be iterated once', async () => {
    const driver = new FakeBrowserDriver({
      pages: { [BOARD]: listingPage([{ title: 'Engineer', href: '/jobs/1' }]) },
    });
    const run = runScraper(driver, config(), BOARD);
    await collectScrape(run);

    expect(() => run[Symbol.asyncIterator]()).toThrow(RuntimeFailureError);
  });

  it('yields lazily, one page at a time', async () => {
    const driver = new FakeBrowserDriver({
      pages: {
        [BOARD]: listingPage([{ title: 'Engineer', href: '/jobs/1' }], { href: '?page=2' }),
        [PAGE_2]: listingPage([{ title: 'Designer', href: '/jobs/2' }]),
      },
      transitions: { [BOARD]: { 'a.next': PAGE_2 } },
    });
    const run = runScraper(driver, config({ paginationSelector: 'a.next' }), BOARD);

    for await (const record of run) {
      expect(record.title).toBe('Engineer');
      break;
    }

    expect(driver.actions).toEqual([`open ${BOARD}`]);
    expect(run.termination).toBeNull();
  });
});

describe('scheduled runs over unchanged boards', () => {
  it('ends as NO_MORE_JOBS when every well-formed row is already known', async () => {
    const driver = new FakeBrowserDriver({
      pages: {
        [BOARD]: listingPage([
          { title: 'Engineer', href: '/jobs/1' },
          { title: 'Designer', href: '/jobs/2' },
          { title: 'Broken Row' },
        ]),
      },
    });

    const { records, termination } = await collectScrape(
      runScraper(driver, config(), BOARD, {
        mode: 'scheduled',
        knownUrls: ['https://acme.example/jobs/1', 'https://acme.example/jobs/2'],
      }),
    );

    expect(records).toHaveLength(0);
    expect(termination.reason).toBe('DUPLICATE_RATIO');
    expect(termination.wellFormed).toBe(2);
    expect(termination.droppedMalformed).toBe(1);
    expect(termination.category).toBe('NO_MORE_JOBS');
  });
});

describe('categorizeTermination', () => {
  const stats = { pagesVisited: 2, wellFormed: 0, droppedMalformed: 4 };

  it('treats a fully malformed run as selector drift', () => {
    expect(categorizeTermination('NO_NEXT_CONTROL', stats)).toBe('SELECTOR_DRIFT');
  });

  it('does not call drift when well-formed rows were seen but not yielded', () => {
    expect(categorizeTermination('DUPLICATE_RATIO', { ...stats, wellFormed: 2, droppedMalformed: 1 })).toBe(
      'NO_MORE_JOBS',
    );
  });

  it('treats an empty later page as the end of the listings', () => {
    expect(categorizeTermination('EMPTY_PAGE', { ...stats, droppedMalformed: 0 })).toBe('NO_MORE_JOBS');
  });
});
