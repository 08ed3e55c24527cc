import { Request, Response } from 'express';
import { ArtworkRegistry, RegistryErrorCode, isRegistryError } from '../registry';
import { StructuredLogger, logger as defaultLogger } from '../logging/structured-logger';
import {
  ApiError,
  parseAssetId,
  parseListing,
  requireCaller,
  requireInteger,
  requireString,
  requireStringArray,
} from './request-params';

const COMPONENT = 'RegistryAPI';

const STATUS_BY_CODE: Record<RegistryErrorCode, number> = {
  [RegistryErrorCode.NotAdmin]: 403,
  [RegistryErrorCode.NotOwner]: 403,
  [RegistryErrorCode.AssetExists]: 409,
  [RegistryErrorCode.AssetNotFound]: 404,
  [RegistryErrorCode.InvalidDetails]: 400,
  [RegistryErrorCode.MaxBatchSize]: 400,
};

/**
 * ARTWORK REGISTRY API
 *
 * HTTP handlers over ArtworkRegistry. The caller identity comes from the
 * X-Caller-Id header; every other check happens inside the registry.
 */
export class RegistryAPI {
  constructor(
    private readonly registry: ArtworkRegistry,
    private readonly logger: StructuredLogger = defaultLogger
  ) {}

  /**
   * POST /api/artworks
   * Administrator mints one artwork.
   */
  addArtwork(req: Request, res: Response): void {
    try {
      const caller = requireCaller(req);
      const details = requireString(req.body, 'details');
      const id = this.registry.addArtwork(details, caller);
      res.status(201).json({ success: true, id });
    } catch (error) {
      this.sendError(res, error);
    }
  }

  /**
   * POST /api/artworks/batch
   * Administrator mints up to 50 artworks; invalid items are dropped.
   */
  batchMint(req: Request, res: Response): void {
    try {
      const caller = requireCaller(req);
      const detailsList = requireStringArray(req.body, 'details');
      const ids = this.registry.batchMint(detailsList, caller);
      res.status(201).json({ success: true, requested: detailsList.length, ids });
    } catch (error) {
      this.sendError(res, error);
    }
  }

  /**
   * POST /api/artworks/:id/transfer
   * Submitted by the recipient (`to`).
   */
  transfer(req: Request, res: Response): void {
    try {
      const caller = requireCaller(req);
      const id = parseAssetId(req);
      const from = requireString(req.body, 'from');
      const to = requireString(req.body, 'to');
      this.registry.transfer(id, from, to, caller);
      res.json({ success: true, id, owner: to });
    } catch (error) {
      this.sendError(res, error);
    }
  }

  /**
   * PUT /api/artworks/:id/details
   */
  updateDetails(req: Request, res: Response): void {
    try {
      const caller = requireCaller(req);
      const id = parseAssetId(req);
      const details = requireString(req.body, 'details');
      this.registry.updateDetails(id, details, caller);
      res.json({ success: true, id });
    } catch (error) {
      this.sendError(res, error);
    }
  }

  /**
   * PUT /api/artworks/:id/details/secure
   * Owner or administrator.
   */
  secureUpdateDetails(req: Request, res: Response): void {
    try {
      const caller = requireCaller(req);
      const id = parseAssetId(req);
      const details = requireString(req.body, 'details');
      this.registry.secureUpdateDetails(id, details, caller);
      res.json({ success: true, id });
    } catch (error) {
      this.sendError(res, error);
    }
  }

  /**
   * POST /api/artworks/reserve
   */
  reserveIds(req: Request, res: Response): void {
    try {
      const caller = requireCaller(req);
      const count = requireInteger(req.body, 'count');
      if (count < 0) {
        throw new ApiError(400, 'BadRequest', 'count must not be negative');
      }
      const latestId = this.registry.reserveIds(count, caller);
      res.json({ success: true, latestId });
    } catch (error) {
      this.sendError(res, error);
    }
  }

  /**
   * GET /api/artworks/:id
   */
  getArtwork(req: Request, res: Response): void {
    try {
      const id = parseAssetId(req);
      res.json({
        success: true,
        ...this.registry.getArtwork(id),
        valid: this.registry.validateId(id),
      });
    } catch (error) {
      this.sendError(res, error);
    }
  }

  /**
   * GET /api/artworks?start=&count=
   */
  listArtworks(req: Request, res: Response): void {
    try {
      const { start, count } = parseListing(req.query);
      res.json({ success: true, ...this.registry.listArtworksPaginated(start, count) });
    } catch (error) {
      this.sendError(res, error);
    }
  }

  /**
   * GET /api/artworks/transferred?start=&count=
   */
  listTransferred(req: Request, res: Response): void {
    try {
      const { start, count } = parseListing(req.query);
      res.json({ success: true, ids: this.registry.listTransferred(start, count) });
    } catch (error) {
      this.sendError(res, error);
    }
  }

  /**
   * GET /api/artworks/pagination?start=&count=
   */
  paginateInfo(req: Request, res: Response): void {
    try {
      const { start, count } = parseListing(req.query);
      res.json({ success: true, ...this.registry.paginateInfo(start, count) });
    } catch (error) {
      this.sendError(res, error);
    }
  }

  /**
   * GET /api/registry/stats
   */
  getStats(_req: Request, res: Response): void {
    res.json({
      success: true,
      latestId: this.registry.getLatestId(),
      totalCount: this.registry.getTotalCount(),
    });
  }

  private sendError(res: Response, error: unknown): void {
    if (isRegistryError(error)) {
      res.status(STATUS_BY_CODE[error.code]).json({
        success: false,
        error: error.message,
        code: error.code,
        codeName: error.codeName,
      });
      return;
    }

    if (error instanceof ApiError) {
      res.status(error.status).json({
        success: false,
        error: error.message,
        codeName: error.codeName,
      });
      return;
    }

    // Argument-range faults raised by the registry (reserve counts, id space)
    if (error instanceof RangeError) {
      res.status(400).json({ success: false, error: error.message, codeName: 'BadRequest' });
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(COMPONENT, 'Unhandled error', { error: message });
    res.status(500).json({ success: false, error: message });
  }
}
