import path from 'node:path';
import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import type { CsvToJson, ParseOptions } from '@csvjson/core';
import { OptionsError } from '@csvjson/core';
import { parseQueryOptions } from './http/queryOptions.js';
import { discardBody, extractUpload } from './http/upload.js';
import type { Upload } from './http/upload.js';
import type { ResponseOutcome } from './http/respond.js';
import { sendConversion, sendError, statusFor } from './http/respond.js';

/** Called with the outcome of every conversion request, after the response has ended or been cut. */
export type OutcomeListener = (outcome: ResponseOutcome) => void;

export interface AppOptions {
  readonly onOutcome?: OutcomeListener;
}

/**
 * Build the HTTP application: `POST /` converts the request's CSV into a streamed
 * JSON array; every other route is `404` with an empty body.
 */
export function createApp(converter: CsvToJson, options: AppOptions = {}): Express {
  const app = express();

  app.post('/', (req, res, next) => {
    convertRequest(converter, req, res)
      .then((outcome) => {
        options.onOutcome?.(outcome);
      })
      .catch(next);
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).end();
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (res.headersSent) {
      res.destroy(error instanceof Error ? error : undefined);
      return;
    }
    sendError(res, statusFor(error), error instanceof Error ? error.message : String(error));
  });

  return app;
}

async function convertRequest(converter: CsvToJson, req: Request, res: Response): Promise<ResponseOutcome> {
  let options: ParseOptions;
  try {
    options = parseQueryOptions(req.query);
  } catch (error) {
    if (!(error instanceof OptionsError)) throw error;
    discardBody(req);
    sendError(res, 400, `invalid query parameters: ${error.message}`);
    return { kind: 'rejected', status: 400, error };
  }

  let upload: Upload;
  try {
    upload = await extractUpload(req);
  } catch (error) {
    discardBody(req);
    const status = statusFor(error);
    sendError(res, status, error instanceof Error ? error.message : String(error));
    return { kind: 'rejected', status, error };
  }

  if (upload.fileName) {
    const baseName = path.parse(upload.fileName).name || 'converted';
    res.attachment(`${baseName}.json`);
  }

  return sendConversion(res, converter.convert(upload.source, options));
}
