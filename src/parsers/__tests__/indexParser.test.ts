import { describe, it, expect } from 'vitest';
import { parseCategoryLinks, parseSubjectLinks } from '../indexParser.js';
import { ParseError } from '../../errors.js';
import { BASE_URL } from '../../__tests__/fixtures.js';

describe('parseCategoryLinks', () => {
  it('resolves category links against the index URL', () => {
    const html = `
      <ul id="/university-course-descriptions/">
        <li><a href="/university-course-descriptions/undergraduate/">Undergraduate</a></li>
        <li><a href="graduate/">Graduate</a></li>
        <li><a href="graduate/">Graduate (again)</a></li>
      </ul>`;

    expect(parseCategoryLinks(html, BASE_URL)).toEqual([
      'https://bulletins.example.edu/university-course-descriptions/undergraduate/',
      'https://bulletins.example.edu/university-course-descriptions/graduate/',
    ]);
  });

  it('throws when the category list is missing', () => {
    expect(() => parseCategoryLinks('<html><body></body></html>', BASE_URL)).toThrow(ParseError);
  });
});

describe('parseSubjectLinks', () => {
  const categoryUrl = `${BASE_URL}undergraduate/`;

  it('collects subject links and skips jump links', () => {
    const html = `
      <div class="az_sitemap">
        <ul><li><a href="#A">A</a></li><li><a href="#C">C</a></li></ul>
        <h2 id="A">A</h2>
        <ul><li><a href="abe/">Agricultural and Biological Engineering (A B E)</a></li></ul>
        <h2 id="C">C</h2>
        <ul><li><a href="/university-course-descriptions/undergraduate/cmpsc/">Computer Science (CMPSC)</a></li></ul>
      </div>`;

    expect(parseSubjectLinks(html, categoryUrl)).toEqual([
      `${BASE_URL}undergraduate/abe/`,
      `${BASE_URL}undergraduate/cmpsc/`,
    ]);
  });

  it('throws when the sitemap is missing', () => {
    expect(() => parseSubjectLinks('<html></html>', categoryUrl)).toThrow(`A-Z subject list not found on ${categoryUrl}`);
  });
});
