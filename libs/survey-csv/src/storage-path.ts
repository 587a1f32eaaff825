import { v4 as uuidv4 } from 'uuid';

export interface LectureInstance {
  courseName: string;
  lectureDate: string;
  lectureNumber: number;
}

/**
 * Lowercase ASCII slug; runs of other characters become a single '-'
 */
export function slugify(value: string, allowPeriod = false): string {
  const pattern = allowPeriod ? /[^a-z0-9._-]+/g : /[^a-z0-9_-]+/g;
  const slug = value
    .trim()
    .toLowerCase()
    .replace(pattern, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug.length > 0 ? slug : 'value';
}

/**
 * `<course>/<date>-lecture-<n>/<random hex>_<file name>`
 */
export function buildStoragePath(
  lecture: LectureInstance,
  filename: string | undefined,
): string {
  const course = slugify(lecture.courseName);
  const lectureSegment = `${lecture.lectureDate}-lecture-${lecture.lectureNumber}`;
  const safeFilename = slugify(filename || 'uploaded.csv', true);
  const suffix = uuidv4().replace(/-/g, '');
  return [course, lectureSegment, `${suffix}_${safeFilename}`].join('/');
}
