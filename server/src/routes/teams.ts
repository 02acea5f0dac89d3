import { Hono } from 'hono';
import { NotFoundError } from '../lib/errors.js';
import { getTeam, teamStats } from '../agents/teams.js';

const teams = new Hono();

teams.get('/:id', async (c) => {
  const id = c.req.param('id');
  const team = await getTeam(id);
  if (!team) throw new NotFoundError('Team', id);
  return c.json({ team, stats: teamStats(team) });
});

export { teams };
