import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { formatIssues } from './errors.js';

export const CourseUnitSchema = z.object({
  unitId: z.string(),
  title: z.string(),
  content: z.string()
});

export const CourseDetailSchema = z.object({
  title: z.string(),
  units: z.array(CourseUnitSchema),
  updatedAt: z.string()
});

/** Course id → course; key order is listing order. */
export const CatalogSchema = z.record(CourseDetailSchema);

export type CourseUnit = Readonly<z.infer<typeof CourseUnitSchema>>;

export type CourseDetail = Readonly<{ title: string; units: readonly CourseUnit[]; updatedAt: string }>;

export type CourseSummary = { id: string; title: string };

export interface ContentCatalog {
  listCourses(): CourseSummary[];
  getCourse(id: string): CourseDetail | null;
}

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../data/courses.json', import.meta.url));

function freezeCourse(course: z.infer<typeof CourseDetailSchema>): CourseDetail {
  return Object.freeze({
    title: course.title,
    updatedAt: course.updatedAt,
    units: Object.freeze(course.units.map((u) => Object.freeze({ ...u })))
  });
}

export class StaticContentCatalog implements ContentCatalog {
  private readonly courses: ReadonlyMap<string, CourseDetail>;

  constructor(source: unknown) {
    const parsed = CatalogSchema.safeParse(source);
    if (!parsed.success) throw new Error(`catalog: ${formatIssues(parsed.error)}`);
    this.courses = new Map(Object.entries(parsed.data).map(([id, c]) => [id, freezeCourse(c)]));
  }

  static fromFile(path: string = DEFAULT_CATALOG_PATH) {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
    return new StaticContentCatalog(raw);
  }

  listCourses() {
    return [...this.courses].map(([id, c]) => ({ id, title: c.title }));
  }

  getCourse(id: string) {
    return this.courses.get(id) ?? null;
  }
}
