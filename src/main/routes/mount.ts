import { type Request, type Response, Router } from 'express';
import { parseDec, parseRa, toDecimalDegrees, toDecimalHours } from '../../common/coordinates';
import { ObjectNotFoundError } from '../../common/errors';
import type { GridCenter } from '../../common/grid';
import { buildGrid } from '../../common/grid';
import type { MoveDirections, ZoomCommand } from '../../common/types';
import type { GotoTarget, MountController, MountEventName, ObjectResolver } from '../mountController';
import type { StatusHistory } from '../statusHistory';
import { BadRequestError, bodyOf, optionalBoolean, queryNumber, queryString, route } from './http';

export interface MountRouterDeps {
  controller: MountController;
  history: StatusHistory;
  resolver?: ObjectResolver;
}

const STREAMED_EVENTS: MountEventName[] = ['updated', 'gotoStart', 'gotoReached', 'moving', 'idle'];
const DIRECTIONS = ['north', 'south', 'east', 'west'] as const;
const ZOOM_COMMANDS: ReadonlySet<string> = new Set<ZoomCommand>(['in', 'out', 'reset']);

function isZoomCommand(value: unknown): value is ZoomCommand {
  return typeof value === 'string' && ZOOM_COMMANDS.has(value);
}

function isCoordinateValue(value: unknown): value is number | string | readonly number[] {
  if (typeof value === 'number' || typeof value === 'string') {
    return true;
  }
  return Array.isArray(value) && value.every((part) => typeof part === 'number');
}

function toGotoTarget(body: Record<string, unknown>): GotoTarget {
  const name = typeof body.name === 'string' && body.name.trim() ? body.name.trim() : undefined;
  const { ra, dec } = body;
  if (ra !== undefined || dec !== undefined) {
    if (!isCoordinateValue(ra) || !isCoordinateValue(dec)) {
      throw new BadRequestError('"ra" and "dec" must be numbers, number arrays or strings.');
    }
    return { ra, dec, name };
  }
  if (name) {
    return { name };
  }
  throw new BadRequestError('Expected a "name" or an "ra"/"dec" pair.');
}

function toDirections(body: Record<string, unknown>): Partial<MoveDirections> {
  const directions: Partial<MoveDirections> = {};
  for (const key of DIRECTIONS) {
    const value = optionalBoolean(body, key);
    if (value !== undefined) {
      directions[key] = value;
    }
  }
  return directions;
}

async function gridCenter(req: Request, resolver: ObjectResolver | undefined): Promise<GridCenter> {
  const name = queryString(req, 'name');
  if (name) {
    const found = resolver ? await resolver.findObject(name) : undefined;
    if (!found) {
      throw new ObjectNotFoundError(name);
    }
    return { ra: found.ra / 15, dec: found.dec };
  }
  const ra = queryString(req, 'ra');
  const dec = queryString(req, 'dec');
  if (ra === undefined || dec === undefined) {
    throw new BadRequestError('Expected a "name" or an "ra"/"dec" pair.');
  }
  return { ra: toDecimalHours(parseRa(ra)), dec: toDecimalDegrees(parseDec(dec)) };
}

function streamEvents(controller: MountController, req: Request, res: Response): void {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.flushHeaders();

  const send = (event: string, data: unknown) => {
    res.write(`event: ${event}\ndata: ${JSON.stringify(data ?? {})}\n\n`);
  };

  const unsubscribers = STREAMED_EVENTS.map((event) =>
    controller.onMountEvent(event, (...args: unknown[]) => send(event, args[0]))
  );
  send('updated', controller.getSnapshot());

  req.on('close', () => {
    unsubscribers.forEach((unsubscribe) => unsubscribe());
  });
}

export function createMountRouter({ controller, history, resolver }: MountRouterDeps): Router {
  const router = Router();

  router.get('/status', (_req, res) => {
    res.json(controller.getSnapshot());
  });

  router.post(
    '/refresh',
    route(async (_req, res) => {
      const summary = await controller.refreshStatus();
      res.json({ ...summary, snapshot: controller.getSnapshot() });
    })
  );

  router.post(
    '/goto',
    route(async (req, res) => {
      const outcome = await controller.goto(toGotoTarget(bodyOf(req)));
      if (outcome.status === 'rejected') {
        const status = outcome.error instanceof ObjectNotFoundError ? 404 : 400;
        res.status(status).json({ status: outcome.status, error: outcome.error.message, code: outcome.error.code });
        return;
      }
      res.json(outcome);
    })
  );

  router.post(
    '/move',
    route(async (req, res) => {
      const reply = await controller.move(toDirections(bodyOf(req)));
      res.json({ reply });
    })
  );

  router.post(
    '/stop',
    route(async (_req, res) => {
      res.json({ reply: await controller.stop() });
    })
  );

  router.post(
    '/start',
    route(async (_req, res) => {
      await controller.start();
      res.json({ polling: controller.isPolling() });
    })
  );

  router.post(
    '/align',
    route(async (_req, res) => {
      res.json({ reply: await controller.align() });
    })
  );

  router.post(
    '/home',
    route(async (_req, res) => {
      res.json({ reply: await controller.home() });
    })
  );

  router.post(
    '/revert',
    route(async (_req, res) => {
      res.json({ reverted: await controller.revert() });
    })
  );

  router.post(
    '/speed',
    route(async (req, res) => {
      const body = bodyOf(req);
      if (isZoomCommand(body.zoom)) {
        res.json({ speed: await controller.zoom(body.zoom) });
        return;
      }
      if (typeof body.level !== 'number') {
        throw new BadRequestError('Expected a numeric "level" or a "zoom" of in, out or reset.');
      }
      const reply = await controller.setSpeed(body.level);
      res.json({ reply, speed: controller.getSpeed() });
    })
  );

  router.put(
    '/options',
    route(async (req, res) => {
      const body = bodyOf(req);
      const autoReverse = optionalBoolean(body, 'autoReverse');
      const autoScreen = optionalBoolean(body, 'autoScreen');
      if (autoReverse !== undefined) {
        controller.setAutoReverse(autoReverse);
      }
      if (autoScreen !== undefined) {
        controller.setAutoScreen(autoScreen);
      }
      const snapshot = controller.getSnapshot();
      res.json({ autoReverse: snapshot.autoReverse, autoScreen: snapshot.autoScreen });
    })
  );

  router.get(
    '/screen',
    route(async (_req, res) => {
      const raster = await controller.getScreen();
      if (!raster) {
        res.status(204).end();
        return;
      }
      res.setHeader('Content-Type', 'application/octet-stream');
      res.setHeader('X-Width', String(raster.width));
      res.setHeader('X-Height', String(raster.height));
      res.send(Buffer.from(raster.data));
    })
  );

  router.get(
    '/links',
    route(async (_req, res) => {
      const skyMap = await controller.web();
      const location = await controller.location();
      res.json({ skyMap, location });
    })
  );

  router.get(
    '/grid',
    route(async (req, res) => {
      const center = await gridCenter(req, resolver);
      const count = queryNumber(req, 'n');
      const step = queryNumber(req, 'step');
      res.json(buildGrid(center, count, step));
    })
  );

  router.get('/history.csv', (_req, res) => {
    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.send(history.toCsv());
  });

  router.get('/events', (req, res) => {
    streamEvents(controller, req, res);
  });

  return router;
}
