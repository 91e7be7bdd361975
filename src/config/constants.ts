import { PACKAGE_VERSION } from '../utils/version';

export const APP_NAME = 'section-scraper';
export const APP_VERSION = PACKAGE_VERSION;

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36';

export const BROWSER_VIEWPORT = { width: 1920, height: 1080 } as const;

export const BROWSER_LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-accelerated-2d-canvas',
  '--no-first-run',
  '--no-zygote',
  '--disable-gpu',
  '--disable-extensions',
  '--disable-default-apps',
] as const;

export const MCP_TOOL_DESCRIPTIONS = {
  SCRAPE:
    'Extract structured, section-labelled content from a web page. Tries a fast static fetch first and falls back to a headless browser render when the static HTML carries too little content; rendered pages are explored by clicking tabs and "load more" buttons, scrolling, and following same-origin pagination (bounded to 3 pages / 3 scrolls). Returns page meta, an ordered list of sections (type, label, text, raw HTML, links, images, lists, tables) and the non-fatal errors met along the way.',
  HEALTH: 'Liveness check. Returns {"status":"ok"} without touching the scraping pipeline.',
} as const;
