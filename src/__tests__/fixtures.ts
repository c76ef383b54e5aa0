/**
 * HTML builders for bulletin subject pages
 */

export const BASE_URL = 'https://bulletins.example.edu/university-course-descriptions/';

export interface BlockSpec {
  subject: string;
  number: string;
  title?: string;
  credits?: string;
  description?: string;
  extras?: string[];
}

export function courseBlock(spec: BlockSpec): string {
  const title = spec.title !== undefined ? `<div class="course_codetitle">${spec.title}</div>` : '';
  const credits = spec.credits !== undefined ? `<div class="course_credits">${spec.credits}</div>` : '';
  const description = spec.description !== undefined
    ? `<div class="courseblockdesc"><p>${spec.description}</p></div>`
    : '';
  const extras = (spec.extras ?? []).map(text => `<p>${text}</p>`).join('\n');

  return `
<div class="courseblock">
  <div class="courseblocktitle_bubble">
    <div class="course_code"><span>${spec.subject}</span>&nbsp;<span>${spec.number}</span></div>
    ${title}
    ${credits}
  </div>
  ${description}
  <div class="courseblockextra">${extras}</div>
</div>`;
}

export function subjectPage(blocks: string[]): string {
  return `<!DOCTYPE html>
<html>
<head><title>Subject | Bulletin</title></head>
<body>
  <div id="textcontainer">
    <div class="sc_sccoursedescs">
      ${blocks.join('\n')}
    </div>
  </div>
</body>
</html>`;
}

export function simpleCoursePage(subject: string, number: string, title: string): string {
  return subjectPage([courseBlock({ subject, number, title, credits: '3 Credits', description: `${title}.` })]);
}

export const UNRECOGNIZED_PAGE = '<html><body><main><h1>Page moved</h1></main></body></html>';
