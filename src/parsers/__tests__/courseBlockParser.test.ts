/**
 * Tests for the course block parser
 */

import { describe, it, expect } from 'vitest';
import { parseCoursePage } from '../courseBlockParser.js';
import { ParseError } from '../../errors.js';
import { courseBlock, subjectPage, UNRECOGNIZED_PAGE } from '../../__tests__/fixtures.js';

const URL = 'https://bulletins.example.edu/university-course-descriptions/undergraduate/cmpsc/';

describe('parseCoursePage', () => {
  it('yields one field-set per course block', () => {
    const html = subjectPage([
      courseBlock({ subject: 'CMPSC', number: '121', title: 'Introduction to Programming Techniques', credits: '3 Credits' }),
      courseBlock({ subject: 'CMPSC', number: '131', title: 'Programming and Computation I', credits: '3 Credits' }),
      courseBlock({ subject: 'CMPSC', number: '132', title: 'Programming and Computation II', credits: '3 Credits' }),
    ]);

    const blocks = parseCoursePage(html, URL);

    expect(blocks).toHaveLength(3);
    expect(blocks.map(b => b.code)).toEqual(['CMPSC 121', 'CMPSC 131', 'CMPSC 132']);
    expect(blocks.every(b => b.sourceUrl === URL)).toBe(true);
  });

  it('extracts fields from the current markup', () => {
    const html = subjectPage([
      courseBlock({
        subject: 'CMPSC',
        number: '121',
        title: 'Introduction to Programming Techniques',
        credits: '3 Credits',
        description: 'Design and implementation of algorithms.',
        extras: [
          'Enforced Prerequisite at Enrollment: MATH 21 or MATH 22',
          'Cross-listed with: MATH 121',
          'General Education: Quantification (GQ)',
          'Course Objective: students will learn things',
        ],
      }),
    ]);

    const [block] = parseCoursePage(html, URL);

    expect(block).toEqual({
      code: 'CMPSC 121',
      title: 'Introduction to Programming Techniques',
      creditText: '3 Credits',
      description: 'Design and implementation of algorithms.',
      prerequisiteText: 'MATH 21 or MATH 22',
      crossListText: 'MATH 121',
      attributes: ['General Education: Quantification (GQ)'],
      sourceUrl: URL,
    });
  });

  it('keeps concurrent-enrollment notes with the prerequisites', () => {
    const html = subjectPage([
      courseBlock({
        subject: 'E E',
        number: '210',
        title: 'Circuits and Devices',
        extras: ['Prerequisite: PHYS 212', 'Enforced Concurrent at Enrollment: MATH 250'],
      }),
    ]);

    const [block] = parseCoursePage(html, URL);

    expect(block.code).toBe('E E 210');
    expect(block.prerequisiteText).toBe('PHYS 212; Enforced Concurrent at Enrollment: MATH 250');
    expect(block.creditText).toBeUndefined();
  });

  it('reads the legacy single-header markup', () => {
    const html = `
      <div id="courseinventorycontainer">
        <div class="courseblock">
          <p class="courseblocktitle"><strong>CMPSC 360: Discrete Mathematics (3 credits)</strong></p>
          <p class="courseblockdesc">Logic and sets.</p>
          <p class="courseblockextra">Prerequisite: CMPSC 121</p>
        </div>
      </div>`;

    const blocks = parseCoursePage(html, URL);

    expect(blocks).toEqual([
      {
        header: 'CMPSC 360: Discrete Mathematics (3 credits)',
        description: 'Logic and sets.',
        prerequisiteText: 'CMPSC 121',
        attributes: [],
        sourceUrl: URL,
      },
    ]);
  });

  it('still yields a field-set for a block with no title', () => {
    const html = subjectPage([
      courseBlock({ subject: 'CMPSC', number: '999', credits: '3 Credits' }),
      courseBlock({ subject: 'CMPSC', number: '121', title: 'Introduction to Programming Techniques' }),
    ]);

    const blocks = parseCoursePage(html, URL);

    expect(blocks).toHaveLength(2);
    expect(blocks[0].title).toBeUndefined();
    expect(blocks[0].code).toBe('CMPSC 999');
  });

  it('returns an empty list for a subject with no courses', () => {
    expect(parseCoursePage(subjectPage([]), URL)).toEqual([]);
  });

  it('throws ParseError when no course container exists', () => {
    expect(() => parseCoursePage(UNRECOGNIZED_PAGE, URL)).toThrow(ParseError);
  });

  it('throws ParseError for a category page served in place of a subject page', () => {
    const html = `
      <div id="textcontainer">
        <div class="az_sitemap">
          <ul><li><a href="/university-course-descriptions/undergraduate/cmpsc/">Computer Science (CMPSC)</a></li></ul>
        </div>
      </div>`;

    expect(() => parseCoursePage(html, URL)).toThrow(ParseError);
  });

  it('reads course blocks placed directly in the page wrapper', () => {
    const html = `<div id="textcontainer">${courseBlock({ subject: 'STAT', number: '200', title: 'Elementary Statistics' })}</div>`;

    expect(parseCoursePage(html, URL).map(b => b.code)).toEqual(['STAT 200']);
  });
});
