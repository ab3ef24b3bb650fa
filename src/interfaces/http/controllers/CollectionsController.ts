/**
 * Collections Controller — HTTP Boundary for Collection Management
 * Layer: Interfaces (HTTP)
 *
 * I keep this thin: unwrap params/query/body through the envelope schemas,
 * hand a typed request to CollectionsService, send JSON. Conversion, timing
 * and error classification all live in the service. Arrow functions keep
 * `this` bound when Express invokes them as route handlers.
 *
 * Every success body is `{ status: 'success', ...response }`, where response
 * carries `time` (seconds spent in the coordinator call).
 */
import { CollectionsService } from '@application/services/CollectionsService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { parseRequest } from '@interfaces/http/middleware/validation';
import {
  changeAliasesBodySchema,
  collectionParamsSchema,
  createCollectionBodySchema,
  timeoutQuerySchema,
  updateCollectionBodySchema,
} from '@interfaces/http/schemas/collectionSchemas';
import type { Request, Response } from 'express';

export class CollectionsController {
  private service: CollectionsService;

  constructor() {
    this.service = container.resolve<CollectionsService>(TOKENS.CollectionsService);
  }

  create = async (req: Request, res: Response): Promise<void> => {
    const { name } = parseRequest(collectionParamsSchema, req.params);
    const { timeout } = parseRequest(timeoutQuerySchema, req.query);
    const body = parseRequest(createCollectionBodySchema, req.body);

    const response = await this.service.create({ ...body, collectionName: name, timeout });
    res.status(200).json({ status: 'success', ...response });
  };

  update = async (req: Request, res: Response): Promise<void> => {
    const { name } = parseRequest(collectionParamsSchema, req.params);
    const { timeout } = parseRequest(timeoutQuerySchema, req.query);
    const body = parseRequest(updateCollectionBodySchema, req.body);

    const response = await this.service.update({ ...body, collectionName: name, timeout });
    res.status(200).json({ status: 'success', ...response });
  };

  delete = async (req: Request, res: Response): Promise<void> => {
    const { name } = parseRequest(collectionParamsSchema, req.params);
    const { timeout } = parseRequest(timeoutQuerySchema, req.query);

    const response = await this.service.delete({ collectionName: name, timeout });
    res.status(200).json({ status: 'success', ...response });
  };

  updateAliases = async (req: Request, res: Response): Promise<void> => {
    const { timeout } = parseRequest(timeoutQuerySchema, req.query);
    const { actions } = parseRequest(changeAliasesBodySchema, req.body);

    const response = await this.service.updateAliases({ actions, timeout });
    res.status(200).json({ status: 'success', ...response });
  };

  get = async (req: Request, res: Response): Promise<void> => {
    const { name } = parseRequest(collectionParamsSchema, req.params);

    const response = await this.service.get({ collectionName: name });
    res.status(200).json({ status: 'success', ...response });
  };

  list = async (_req: Request, res: Response): Promise<void> => {
    const response = await this.service.list();
    res.status(200).json({ status: 'success', ...response });
  };

  listAliases = async (_req: Request, res: Response): Promise<void> => {
    const response = await this.service.listAliases();
    res.status(200).json({ status: 'success', ...response });
  };

  listCollectionAliases = async (req: Request, res: Response): Promise<void> => {
    const { name } = parseRequest(collectionParamsSchema, req.params);

    const response = await this.service.listCollectionAliases({ collectionName: name });
    res.status(200).json({ status: 'success', ...response });
  };
}
