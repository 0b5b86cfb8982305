import type { IncomingMessage, ServerResponse } from 'node:http';
import logger from '../../logger.js';
import type { DetectionEngine } from '../../detection/engine.js';
import { UnknownScenarioError } from '../../detection/errors.js';
import type { ScenarioHotReloader, ScenarioSource } from '../../detection/hotReload.js';
import { readJsonBody, RequestBodyError, sendJson, type Handler } from '../respond.js';

export interface DetectionRouterOptions<TFrame> {
  engine: DetectionEngine<TFrame>;
  reloader: ScenarioHotReloader<TFrame>;
  /** Definitions applied by a reload request that carries no body. */
  scenarioSource: ScenarioSource;
}

const SCENARIO_PATH = /^\/api\/scenarios\/([^/]+)$/;
const SCENARIO_RESET_PATH = /^\/api\/scenarios\/([^/]+)\/reset$/;

export class DetectionRouter<TFrame = Buffer> {
  private readonly handlers: Handler[];

  constructor(private readonly options: DetectionRouterOptions<TFrame>) {
    this.handlers = [
      (req, res, url) => this.handleList(req, res, url),
      (req, res, url) => this.handleDetector(req, res, url),
      (req, res, url) => this.handleReload(req, res, url),
      (req, res, url) => this.handleResetAll(req, res, url),
      (req, res, url) => this.handleReset(req, res, url),
      (req, res, url) => this.handleScenario(req, res, url)
    ];
  }

  handle(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    return this.handlers.some(handler => handler(req, res, url));
  }

  private get engine() {
    return this.options.engine;
  }

  private handleList(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/scenarios') {
      return false;
    }
    sendJson(res, 200, { scenarios: this.engine.getAllStatistics() });
    return true;
  }

  private handleScenario(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    const match = SCENARIO_PATH.exec(url.pathname);
    if (req.method !== 'GET' || !match) {
      return false;
    }
    this.withScenario(res, match[1], id => {
      sendJson(res, 200, { scenario: this.engine.getScenarioStatistics(id) });
    });
    return true;
  }

  private handleDetector(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/detector') {
      return false;
    }
    sendJson(res, 200, { detector: this.engine.getDetectorInfo() });
    return true;
  }

  private handleReset(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    const match = SCENARIO_RESET_PATH.exec(url.pathname);
    if (req.method !== 'POST' || !match) {
      return false;
    }
    this.withScenario(res, match[1], id => {
      this.engine.resetScenario(id);
      sendJson(res, 200, { scenario: this.engine.getScenarioStatistics(id) });
    });
    return true;
  }

  private handleResetAll(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'POST' || url.pathname !== '/api/scenarios/reset') {
      return false;
    }
    this.engine.resetAllScenarios();
    sendJson(res, 200, { scenarios: this.engine.getAllStatistics() });
    return true;
  }

  private handleReload(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'POST' || url.pathname !== '/api/scenarios/reload') {
      return false;
    }
    this.reload(req, res).catch(error => {
      logger.error({ err: error }, 'Scenario reload request failed');
      sendJson(res, 500, { error: 'Internal server error' });
    });
    return true;
  }

  private async reload(req: IncomingMessage, res: ServerResponse) {
    let body: unknown;
    try {
      body = await readJsonBody(req);
    } catch (error) {
      if (error instanceof RequestBodyError) {
        sendJson(res, 400, { error: error.message });
        return;
      }
      throw error;
    }

    const source = resolveSource(body, this.options.scenarioSource);
    const outcome = await this.options.reloader.apply(source);
    if (!outcome.ok) {
      sendJson(res, 400, { error: outcome.error.message });
      return;
    }
    sendJson(res, 200, { report: outcome.report });
  }

  private withScenario(res: ServerResponse, encodedId: string, action: (id: string) => void) {
    try {
      action(decodeURIComponent(encodedId));
    } catch (error) {
      if (error instanceof URIError) {
        sendJson(res, 400, { error: 'Invalid scenario id' });
        return;
      }
      if (error instanceof UnknownScenarioError) {
        sendJson(res, 404, { error: error.message });
        return;
      }
      throw error;
    }
  }
}

/** A body of `{ "scenarios": ... }` overrides the configured source. */
function resolveSource(body: unknown, fallback: ScenarioSource): ScenarioSource {
  if (typeof body === 'object' && body !== null && 'scenarios' in body) {
    const scenarios: unknown = body.scenarios;
    return () => scenarios;
  }
  return fallback;
}

export function createDetectionRouter<TFrame>(options: DetectionRouterOptions<TFrame>) {
  return new DetectionRouter<TFrame>(options);
}
