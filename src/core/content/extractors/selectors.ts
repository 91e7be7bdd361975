// CSS selectors for segmentation, noise removal and page interaction

export const HEADING_SELECTORS = 'h1, h2, h3, h4, h5, h6';

export const LANDMARK_SELECTORS = 'header, nav, main, section, footer, article';

export const MAIN_CONTENT_SELECTORS =
  'main, [role="main"], article, #content, .content, .main-content';

// Always removed before segmentation, whatever their attributes
export const NON_CONTENT_SELECTORS = 'script, style, noscript, template';

// Never pruned by attribute rules: frameworks park state classes such as `modal-open` here
export const PROTECTED_TAGS: ReadonlySet<string> = new Set(['html', 'head', 'body']);

// Blocks whose text makes up a section's `text`
export const TEXT_BLOCK_SELECTORS =
  'p, li, blockquote, pre, td, th, dd, dt, figcaption, h1, h2, h3, h4, h5, h6';

// Used only when a section has no text blocks at all
export const FALLBACK_TEXT_SELECTORS = 'div, span';

export const LINK_SELECTORS = 'a[href]';

export const IMAGE_SELECTORS = 'img';

export const LIST_SELECTORS = 'ul, ol';

export const TABLE_SELECTORS = 'table';

export const TABLE_ROW_SELECTORS = 'tr';

export const TABLE_CELL_SELECTORS = 'td, th';

// Interaction targets on rendered pages
export const TAB_SELECTORS =
  '[role="tab"], .tab, .tabs__tab, .nav-tab, .tab-item, .tab-button, [data-toggle="tab"], [data-bs-toggle="tab"]';

export const LOAD_MORE_CLICKABLE_SELECTORS = 'button, a, [role="button"]';

export const LOAD_MORE_TEXT_PATTERN = /\b(load|show)\s+more\b/i;

export const LOAD_MORE_CLASS_SELECTORS =
  '[class*="load-more"], [class*="show-more"], [class*="loadmore"], [class*="showmore"]';

export const NEXT_PAGE_SELECTORS = 'a[rel="next"], link[rel="next"]';

export const NEXT_PAGE_TEXT_PATTERN = /^(next|next page|older|›|»|→|>)$/i;

export const PAGINATION_CONTAINER_SELECTORS =
  '[class*="pagination"], [class*="pager"], nav[aria-label*="pagination" i]';
