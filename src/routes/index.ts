import express, { NextFunction, Request, RequestHandler, Response } from 'express';
import multer from 'multer';
import { getConfig } from '../config/config';
import { InvalidImageError, PayloadTooLargeError } from '../helpers/errors';
import { sendError } from '../helpers/responses';
import logger from '../logger';
import { InferenceService } from '../services/InferenceService';
import { ImageInput, resolveImageInput, toImageBuffer } from '../utils/image-input';

const readImageInput = (req: Request): ImageInput =>
  resolveImageInput({
    file: req.file,
    body: req.body,
    isJson: typeof req.is('application/json') === 'string',
    isMultipart: typeof req.is('multipart/form-data') === 'string',
  });

export const createRoutes = (service: InferenceService): express.Router => {
  const routes = express.Router();

  const { maxUploadBytes, bodySizeLimit } = getConfig();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, files: 1 },
  });

  // Mounted after the availability guards so a 503 wins over body errors.
  const parseJson = express.json({ limit: bodySizeLimit });

  // Parses a multipart `file` field; JSON bodies pass straight through.
  const acceptImage: RequestHandler = (req, res, next) => {
    upload.single('file')(req, res, (err?: unknown) => {
      if (err instanceof multer.MulterError) {
        logger.error(`Error uploading image: ${err.message}`);
        return sendError(
          res,
          err.code === 'LIMIT_FILE_SIZE'
            ? new PayloadTooLargeError('Image exceeds the maximum upload size')
            : new InvalidImageError(`Invalid upload: ${err.message}`),
          logger
        );
      }
      if (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error(`Error reading multipart body: ${message}`);
        return sendError(res, new InvalidImageError(`Invalid upload: ${message}`), logger);
      }
      next();
    });
  };

  const requireModel = (_req: Request, res: Response, next: NextFunction) => {
    try {
      service.requireModel();
      next();
    } catch (err) {
      sendError(res, err, logger);
    }
  };

  const requireCentroids = (_req: Request, res: Response, next: NextFunction) => {
    try {
      service.requireCentroids();
      next();
    } catch (err) {
      sendError(res, err, logger);
    }
  };

  routes.get('/', (_req, res) => {
    res.status(200).json(service.getStatus());
  });

  routes.get('/health', (_req, res) => {
    res.status(200).json(service.getHealth());
  });

  routes.get('/classes', (_req, res) => {
    res.status(200).json(service.listClasses());
  });

  routes.get('/model-info', (_req, res) => {
    res.status(200).json(service.getModelInfo());
  });

  routes.post('/predict', requireModel, parseJson, acceptImage, async (req, res) => {
    try {
      const image = toImageBuffer(readImageInput(req));
      const result = await service.predict(image);
      return res.status(200).json(result);
    } catch (err) {
      return sendError(res, err, logger);
    }
  });

  routes.post('/predict-with-centroids', requireCentroids, parseJson, acceptImage, async (req, res) => {
    try {
      const image = toImageBuffer(readImageInput(req));
      const result = await service.predictWithCentroids(image);
      return res.status(200).json(result);
    } catch (err) {
      return sendError(res, err, logger);
    }
  });

  return routes;
};

export default createRoutes;
