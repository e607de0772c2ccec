import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { TeamService } from '../services/teamService.js';

export interface TeamsRoutesOptions {
  teams: TeamService;
}

const teamParams = z.object({ id: z.string().min(1) });
const memberParams = z.object({ id: z.string().min(1), characterId: z.string().min(1) });
const teamBody = z.object({ name: z.string().trim().min(1).max(200) });
const addMemberBody = z.object({ characterId: z.union([z.string().min(1), z.number().int()]).transform(String) });

// Owner identity is established upstream; this layer only reads it.
const ownerFrom = (headers: Record<string, string | string[] | undefined>): string | undefined => {
  const raw = headers['x-user-id'];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value && value.trim() ? value.trim() : undefined;
};

export default async function teamsRoutes(app: FastifyInstance, opts: TeamsRoutesOptions) {
  const { teams } = opts;

  app.get('/teams', async (req) => {
    const { owner } = z.object({ owner: z.string().optional() }).parse(req.query);
    return teams.listTeams({ ownerId: owner });
  });

  app.post('/teams', async (req, reply) => {
    const body = teamBody.parse(req.body);
    const team = await teams.createTeam({ name: body.name, ownerId: ownerFrom(req.headers) });
    return reply.code(201).send(team);
  });

  app.get('/teams/:id', async (req) => {
    const { id } = teamParams.parse(req.params);
    return teams.getTeamDetail(id);
  });

  app.patch('/teams/:id', async (req) => {
    const { id } = teamParams.parse(req.params);
    const body = teamBody.parse(req.body);
    return teams.renameTeam(id, body.name);
  });

  app.delete('/teams/:id', async (req, reply) => {
    const { id } = teamParams.parse(req.params);
    await teams.deleteTeam(id);
    return reply.code(204).send();
  });

  app.post('/teams/:id/members', async (req, reply) => {
    const { id } = teamParams.parse(req.params);
    const { characterId } = addMemberBody.parse(req.body);
    const result = await teams.addMember(id, characterId);
    if (!result.ok) throw result.error;
    return reply.code(201).send(result.team);
  });

  app.delete('/teams/:id/members/:characterId', async (req) => {
    const { id, characterId } = memberParams.parse(req.params);
    const result = await teams.removeMember(id, characterId);
    if (!result.ok) throw result.error;
    return result.team;
  });
}
