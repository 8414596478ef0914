import fp from 'fastify-plugin';
import type { ContentCatalog } from './courseCatalog.js';

export type CoursesPluginOptions = { catalog: ContentCatalog };

// Static read path; no auth required.
export const coursesPlugin = fp(async (app, opts: CoursesPluginOptions) => {
  const { catalog } = opts;

  app.get('/api/me/classes', async () => ({ ok: true, classes: catalog.listCourses() }));

  app.get<{ Params: { classId: string } }>('/api/me/classes/:classId/bignote', async (req, reply) => {
    const { classId } = req.params;
    const note = catalog.getCourse(classId);
    if (!note) return reply.code(404).send({ ok: false, error: 'not_found', message: 'Class not found' });
    return { ok: true, classId, note };
  });
});
