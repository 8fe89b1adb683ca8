// HTTP boundary for the investigation orchestrator
// Synchronous request/response: the response is sent once the investigation completes

import express, { type Application, type NextFunction, type Request, type Response } from 'express';
import helmet from 'helmet';
import {
  InvalidRequestError, createLogger, errorMessage, parseInvestigationRequest, toWireResponse,
  type InvestigationRequest, type Orchestrator,
} from '@alert-triage/agents';

const log = createLogger('ApiServer');

export const SERVICE_NAME = 'alert-triage';
export const BODY_LIMIT = '1mb';

export interface AppDeps {
  orchestrator: Pick<Orchestrator, 'investigate' | 'describeAgents'>;
}

/** body-parser marks its errors with an HTTP status and a type */
function bodyParserStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string'
    && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export function createApp({ orchestrator }: AppDeps): Application {
  const app = express();

  app.use(helmet());
  app.use(express.json({ limit: BODY_LIMIT }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      log('debug', `${req.method} ${req.path}`, { status: res.statusCode, durationMs: Date.now() - start });
    });
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', service: SERVICE_NAME, uptime: process.uptime() });
  });

  app.get('/v1/agents', (_req: Request, res: Response) => {
    res.json(orchestrator.describeAgents());
  });

  app.post('/v1/investigate', (req: Request, res: Response, next: NextFunction) => {
    let request: InvestigationRequest;
    try {
      request = parseInvestigationRequest(req.body);
    } catch (err) {
      next(err);
      return;
    }

    // A client that hangs up cancels the investigation
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort(new Error('client disconnected'));
    });

    orchestrator.investigate(request, { signal: controller.signal })
      .then((response) => {
        if (controller.signal.aborted) {
          log('info', 'Client left before the investigation finished', { requestId: response.requestId });
          return;
        }
        res.json(toWireResponse(response));
      })
      .catch(next);
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'not_found', message: 'No such route' });
  });

  // Error handler for everything the routes pass on
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof InvalidRequestError) {
      log('info', 'Rejected invalid request', { path: req.path, issues: err.issues });
      res.status(400).json({ error: 'invalid_request', message: err.message, issues: err.issues });
      return;
    }

    const parserStatus = bodyParserStatus(err);
    if (parserStatus !== undefined && parserStatus >= 400 && parserStatus < 500) {
      res.status(parserStatus).json({
        error: parserStatus === 413 ? 'payload_too_large' : 'invalid_request',
        message: errorMessage(err),
        issues: [],
      });
      return;
    }

    log('error', 'Unhandled error', { path: req.path, error: errorMessage(err) });
    res.status(500).json({ error: 'internal_error', message: errorMessage(err) });
  });

  return app;
}
