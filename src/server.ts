import http from 'http';
import express from 'express';
import cors from 'cors';
import { v4 as uuidv4 } from 'uuid';
import { ILogger, IConfiguration, IPropertyDetailsHandler, IServiceProvider } from './interfaces/services';
import { ServiceResponse } from './utils/ResponseTranslator';

export const PROPERTY_DETAILS_ROUTE = '/api/v1/property/details';

// Main API server - one lookup endpoint plus a health check
// Everything it needs comes in through the service provider, so tests can hand in fakes
export class SepticLookupServer {
  private app: express.Application;
  private httpServer: http.Server | null = null;

  // All the stuff we need pulled from the container
  private logger: ILogger;
  private config: IConfiguration;
  private handler: IPropertyDetailsHandler;

  constructor(private readonly services: IServiceProvider) {
    this.logger = services.getLogger();
    this.config = services.getConfiguration();
    this.handler = services.getPropertyDetailsHandler();

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  private setupMiddleware(): void {
    this.app.use(cors()); // Internal consumers call us from other origins too

    // Tag every request so upstream calls and log lines can be correlated
    this.app.use((req, res, next) => {
      const requestId = uuidv4();
      res.locals.requestId = requestId;  // Picked up again by the route handler
      res.set('X-Request-ID', requestId); // Callers can quote this when something goes wrong

      // Never the Authorization header or the query string
      this.logger.info(`${req.method} ${req.path}`, {
        requestId,
        userAgent: req.get('User-Agent'),
        ip: req.ip
      });
      next();
    });
  }

  private setupRoutes(): void {
    // Health check - no auth, no upstream call
    this.app.get('/health', (req, res) => {
      res.json({
        status: 'healthy',
        timestamp: new Date().toISOString()
      });
    });

    // GET /api/v1/property/details - the actual septic lookup
    this.app.get(PROPERTY_DETAILS_ROUTE, this.handlePropertyDetails.bind(this));
  }

  private async handlePropertyDetails(
    req: express.Request,
    res: express.Response,
    next: express.NextFunction
  ): Promise<void> {
    const requestId = typeof res.locals.requestId === 'string' ? res.locals.requestId : uuidv4();

    // If the caller goes away mid-lookup the provider call is abandoned
    const abort = new AbortController();
    res.on('close', () => abort.abort());

    try {
      const response = await this.handler.handle({
        requestId,
        authorization: req.get('Authorization'),
        query: req.query,
        signal: abort.signal
      });
      this.sendServiceResponse(res, response);
    } catch (error) {
      // Not one of our known failures - let the error middleware log it and send a 500
      next(error);
    }
  }

  private sendServiceResponse(res: express.Response, response: ServiceResponse): void {
    if (response.ok) {
      res.status(response.statusCode).json(response.body);
      return;
    }

    // Error kinds carry their own status, headers (Retry-After, WWW-Authenticate) and body
    const { error } = response;
    res.set(error.headers()).status(error.statusCode).json(error.toBody());
  }

  private setupErrorHandling(): void {
    // Anything that didn't match a route
    this.app.use((req, res) => {
      res.status(404).json({
        error: 'Not found',
        path: req.path,
        method: req.method
      });
    });

    this.app.use((error: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
      this.logger.error('Unhandled error:', error);

      // Too late to send our own body, let Express close the connection
      if (res.headersSent) {
        return next(error);
      }

      // Stack traces only show up locally
      res.status(500).json({
        error: 'Internal server error',
        ...(this.config.getNodeEnv() === 'development' && error instanceof Error && {
          details: error.message,
          stack: error.stack
        })
      });
    });
  }

  start(): Promise<void> {
    const port = this.config.getPort();

    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, () => {
        this.logger.info(`Server running on port ${port}`, {
          environment: this.config.getNodeEnv(),
          port
        });
        resolve();
      });
      server.on('error', reject);
      this.httpServer = server;
    });
  }

  async shutdown(): Promise<void> {
    this.logger.info('Shutting down server...');

    const server = this.httpServer;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
      this.httpServer = null;
    }

    // Then let the container release whatever it holds
    await this.services.shutdown();
  }

  getApp(): express.Application {
    return this.app;
  }
}
