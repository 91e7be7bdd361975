export { handleScrapePage } from './scrapePage';
export { handleHealth } from './health';
