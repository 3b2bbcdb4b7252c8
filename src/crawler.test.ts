import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { SiteCrawler } from './crawler.js';
import { classifyLink } from './link.js';
import { createSession, downloadOrder } from './session.js';
import { ConsistencyError, InterruptedError } from './errors.js';
import { FakeRenderer, listingPage, testConfig, type ScriptedPage } from './testing/fake-site.js';
import type { Config, CrawlSession } from './types.js';

const ACCOUNT_SITE: Record<string, ScriptedPage> = {
  'https://vimeo.com/someaccount/videos': listingPage(
    [
      'https://vimeo.com/300',
      'https://vimeo.com/someaccount/settings',
      'https://example.com/elsewhere',
      'https://vimeo.com/100'
    ],
    'https://vimeo.com/someaccount/videos/page:2'
  ),
  'https://vimeo.com/someaccount/videos/page:2': listingPage(['https://vimeo.com/200']),
  'https://vimeo.com/someaccount/channels': listingPage(['https://vimeo.com/channels/staffpicks']),
  'https://vimeo.com/someaccount/albums': listingPage(['https://vimeo.com/album/42']),
  'https://vimeo.com/channels/staffpicks/videos': {
    elements: {
      ...listingPage(['https://vimeo.com/100', 'https://vimeo.com/400']).elements,
      '#page_header h1': [{ text: 'Staff Picks.' }]
    }
  },
  'https://vimeo.com/album/42': {
    elements: {
      ...listingPage(['https://vimeo.com/500']).elements,
      '#group_header h1 a': [{ text: '', attributes: { title: 'Holiday: 2020' } }]
    }
  }
};

describe('SiteCrawler', () => {
  let outputDir: string;
  let session: CrawlSession;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'crawler-test-'));
    session = createSession();
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  function crawler(renderer: FakeRenderer, overrides: Partial<Config> = {}, signal?: AbortSignal) {
    return new SiteCrawler(renderer, testConfig(outputDir, overrides), session, signal);
  }

  describe('account crawl', () => {
    it('walks uploads, then channels, then albums', async () => {
      const renderer = new FakeRenderer(ACCOUNT_SITE);
      await crawler(renderer).crawl(classifyLink('someaccount'));

      expect(renderer.visits).toEqual([
        'https://vimeo.com/someaccount/videos',
        'https://vimeo.com/someaccount/videos/page:2',
        'https://vimeo.com/someaccount/channels',
        'https://vimeo.com/channels/staffpicks/videos',
        'https://vimeo.com/someaccount/albums',
        'https://vimeo.com/album/42'
      ]);
      expect([...session.visitedVideoIds]).toEqual([300, 100, 200, 400, 500]);
      expect(downloadOrder(session)).toEqual([500, 400, 300, 200, 100]);
      expect(session.errorCount).toBe(0);
    });

    it('creates one folder per channel and album with a provenance shortcut', async () => {
      await crawler(new FakeRenderer(ACCOUNT_SITE)).crawl(classifyLink('someaccount'));

      expect(session.folders.map((folder) => path.basename(folder.localPath))).toEqual([
        'Staff Picks',
        'Holiday_ 2020'
      ]);
      expect([...session.folders[0].memberVideoIds]).toEqual([100, 400]);
      expect([...session.folders[1].memberVideoIds]).toEqual([500]);

      const shortcut = await fs.readFile(path.join(outputDir, 'Staff Picks', 'source.url'), 'utf-8');
      expect(shortcut).toBe('[InternetShortcut]\nURL=https://vimeo.com/channels/staffpicks\n');
    });

    it('records memberships without folders when folders are disabled', async () => {
      await crawler(new FakeRenderer(ACCOUNT_SITE), { createFolders: false }).crawl(classifyLink('someaccount'));

      expect(session.folders).toEqual([]);
      expect(session.visitedVideoIds.size).toBe(5);
      expect(await fs.readdir(outputDir)).toEqual([]);
    });
  });

  it('does not create folders for a folder crawled on its own', async () => {
    await crawler(new FakeRenderer(ACCOUNT_SITE)).crawl(classifyLink('https://vimeo.com/album/42'));

    expect(session.folders).toEqual([]);
    expect([...session.visitedVideoIds]).toEqual([500]);
  });

  it('limits items per page and pages per listing', async () => {
    const renderer = new FakeRenderer(ACCOUNT_SITE);
    await crawler(renderer, { maxItems: 1 }).crawl(classifyLink('https://vimeo.com/someaccount/videos'));

    expect(renderer.visits).toEqual(['https://vimeo.com/someaccount/videos']);
    expect([...session.visitedVideoIds]).toEqual([300]);
  });

  it('follows the links of a generic page without paginating', async () => {
    const renderer = new FakeRenderer({
      'https://vimeo.com/someaccount/likes': listingPage(['https://vimeo.com/7'], 'https://vimeo.com/someaccount/likes/page:2')
    });
    await crawler(renderer).crawl(classifyLink('https://vimeo.com/someaccount/likes'));

    expect(renderer.visits).toEqual(['https://vimeo.com/someaccount/likes']);
    expect([...session.visitedVideoIds]).toEqual([7]);
  });

  it('resolves relative listing links against the current page', async () => {
    const renderer = new FakeRenderer({
      'https://vimeo.com/someaccount/videos': listingPage(['/100', '/someaccount/settings', '//example.com/elsewhere', '/200'])
    });

    await crawler(renderer).crawl(classifyLink('https://vimeo.com/someaccount/videos'));

    expect([...session.visitedVideoIds]).toEqual([100, 200]);
    expect(session.errorCount).toBe(0);
  });

  it('skips system pages', async () => {
    const renderer = new FakeRenderer({});
    await crawler(renderer).crawl(classifyLink('https://vimeo.com/help'));

    expect(renderer.visits).toEqual([]);
    expect(session.errorCount).toBe(0);
  });

  it('fails loudly on duplicate listing entries', async () => {
    const renderer = new FakeRenderer({
      'https://vimeo.com/someaccount/videos': listingPage(['https://vimeo.com/1', 'https://vimeo.com/1'])
    });

    await expect(crawler(renderer).crawl(classifyLink('https://vimeo.com/someaccount/videos')))
      .rejects.toThrow(ConsistencyError);
  });

  it('fails loudly when pagination repeats an entry', async () => {
    const renderer = new FakeRenderer({
      'https://vimeo.com/someaccount/videos': listingPage(['https://vimeo.com/1'], 'https://vimeo.com/someaccount/videos/page:2'),
      'https://vimeo.com/someaccount/videos/page:2': listingPage(['https://vimeo.com/1'])
    });

    await expect(crawler(renderer).crawl(classifyLink('https://vimeo.com/someaccount/videos')))
      .rejects.toThrow('Duplicate items (1) found in listing');
  });

  it('retries a folder page until its title shows up', async () => {
    const site = { ...ACCOUNT_SITE };
    site['https://vimeo.com/album/42'] = { ...ACCOUNT_SITE['https://vimeo.com/album/42'], emptyLoads: 2 };
    const renderer = new FakeRenderer(site);
    session.createFolders = true;

    await crawler(renderer).crawl(classifyLink('https://vimeo.com/album/42'));

    expect(renderer.visits).toEqual([
      'https://vimeo.com/album/42',
      'https://vimeo.com/album/42',
      'https://vimeo.com/album/42'
    ]);
    expect(session.errorCount).toBe(0);
    expect(path.basename(session.folders[0].localPath)).toBe('Holiday_ 2020');
  });

  it('names a folder after its slug when the title is only dots', async () => {
    const renderer = new FakeRenderer({
      'https://vimeo.com/album/42': {
        elements: {
          ...listingPage(['https://vimeo.com/500']).elements,
          '#group_header h1 a': [{ text: '', attributes: { title: '..' } }]
        }
      }
    });
    session.createFolders = true;

    await crawler(renderer).crawl(classifyLink('https://vimeo.com/album/42'));

    expect(session.folders.map((folder) => folder.localPath)).toEqual([path.join(outputDir, '42')]);
    expect(await fs.readdir(outputDir)).toEqual(['42']);
    expect(await fs.readFile(path.join(outputDir, '42', 'source.url'), 'utf-8'))
      .toBe('[InternetShortcut]\nURL=https://vimeo.com/album/42\n');
  });

  it('counts one error and prunes the folder when its title never shows up', async () => {
    const renderer = new FakeRenderer({ 'https://vimeo.com/album/9': listingPage(['https://vimeo.com/1']) });

    await crawler(renderer).crawl(classifyLink('https://vimeo.com/album/9'));

    expect(renderer.visits).toHaveLength(3);
    expect(session.errorCount).toBe(1);
    expect(session.visitedVideoIds.size).toBe(0);
  });

  it('counts an error and prunes the branch when a page cannot be loaded', async () => {
    const renderer = new FakeRenderer({ 'https://vimeo.com/someaccount/videos': { elements: {}, unreachable: true } });

    await crawler(renderer).crawl(classifyLink('someaccount'));

    expect(session.errorCount).toBe(1);
    expect(renderer.visits).toEqual(['https://vimeo.com/someaccount/videos']);
  });

  it('stops when the run is interrupted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(crawler(new FakeRenderer(ACCOUNT_SITE), {}, controller.signal).crawl(classifyLink('someaccount')))
      .rejects.toThrow(InterruptedError);
  });

  describe('login', () => {
    const LOGIN_SITE: Record<string, ScriptedPage> = {
      'https://vimeo.com/log_in': {
        elements: {
          '#email': [{}],
          '#password': [{}],
          '#login_form input[type=submit]': [{ text: 'Log in', navigatesTo: 'https://vimeo.com/home' }]
        }
      },
      'https://vimeo.com/home': {
        elements: { '#menu .me a': [{ text: 'Me', navigatesTo: 'https://vimeo.com/someaccount' }] }
      }
    };

    it('submits the credentials and lands on the account page', async () => {
      const renderer = new FakeRenderer(LOGIN_SITE);

      const loggedIn = await crawler(renderer).login({ email: 'user@example.com', password: 'test-secret' });

      expect(loggedIn).toBe(true);
      expect(renderer.filled).toEqual(['user@example.com', 'test-secret']);
      expect(renderer.currentUrl()).toBe('https://vimeo.com/someaccount');
    });

    it('gives up after the retry budget', async () => {
      const renderer = new FakeRenderer({});

      const loggedIn = await crawler(renderer).login({ email: 'user@example.com', password: 'test-secret' });

      expect(loggedIn).toBe(false);
      expect(renderer.visits).toEqual(['https://vimeo.com/log_in', 'https://vimeo.com/log_in']);
      expect(session.errorCount).toBe(1);
    });
  });
});
