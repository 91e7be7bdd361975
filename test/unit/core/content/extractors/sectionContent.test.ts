import { describe, test, expect } from '@jest/globals';
import * as cheerio from 'cheerio';
import {
  extractSectionContent,
  selectWithin,
} from '../../../../../src/core/content/extractors/sectionContent';

describe('extractSectionContent', () => {
  const $ = cheerio.load(
    '<section>' +
      '<a href="/a">A</a><a href="">empty</a>' +
      '<img src="/x.png"><img data-src="/lazy.png"><img>' +
      '<table><tr><th>Plan</th><th>Price</th></tr><tr><td>Pro</td><td>$10</td></tr></table>' +
      '<ol><li>One</li><li> <b>Two</b> </li></ol>' +
      '</section>'
  );
  const content = extractSectionContent($, $('section').toArray());

  test('collects links with a non-empty href', () => {
    expect(content.links).toEqual(['/a']);
  });

  test('collects image sources, falling back to data-src', () => {
    expect(content.images).toEqual(['/x.png', '/lazy.png']);
  });

  test('collects table cells row by row', () => {
    expect(content.tables).toEqual([
      [
        ['Plan', 'Price'],
        ['Pro', '$10'],
      ],
    ]);
  });

  test('collects direct list items with normalized text', () => {
    expect(content.lists).toEqual([['One', 'Two']]);
  });

  test('joins the text of outermost text blocks', () => {
    expect(content.text).toBe('Plan Price Pro $10 One Two');
  });

  test('does not repeat text of nested blocks', () => {
    const nested = cheerio.load('<div><blockquote><p>Quoted</p></blockquote></div>');
    expect(extractSectionContent(nested, nested('div').toArray()).text).toBe('Quoted');
  });
});

describe('selectWithin', () => {
  test('includes scope roots that match the selector', () => {
    const $ = cheerio.load('<body><p>a</p><div><p>b</p></div></body>');
    const found = selectWithin($, $('body').children().toArray(), 'p');

    expect(found.map(el => $(el).text())).toEqual(['a', 'b']);
  });
});
