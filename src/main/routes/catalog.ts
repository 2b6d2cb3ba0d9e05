import { Router } from 'express';
import { raFromDegrees, formatCoordinate, parseDec } from '../../common/coordinates';
import { ObjectNotFoundError } from '../../common/errors';
import type { ObjectResolver } from '../mountController';
import { route } from './http';

export function createCatalogRouter(resolver: ObjectResolver): Router {
  const router = Router();

  router.get(
    '/:name',
    route(async (req, res) => {
      const name = req.params.name;
      const found = await resolver.findObject(name);
      if (!found) {
        throw new ObjectNotFoundError(name);
      }
      res.json({
        ...found,
        raText: formatCoordinate(raFromDegrees(found.ra)),
        decText: formatCoordinate(parseDec(found.dec))
      });
    })
  );

  return router;
}
