import { Inject, Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { Constants } from '../../constants';
import { LoggingService } from '../logging.service';

/**
 * Middleware for API key validation
 *
 * Validates the X-API-Key header against API_KEY.
 * Closes the connection without response if the key is missing or invalid.
 */
@Injectable()
export class ApiKeyMiddleware implements NestMiddleware {
  private readonly context = ApiKeyMiddleware.name;

  @Inject(LoggingService)
  private readonly logger!: LoggingService;

  public use(req: Request, res: Response, next: NextFunction): void {
    const expectedApiKey = Constants.API.KEY;

    // Skip validation if no API key is configured (development mode)
    if (!expectedApiKey) {
      this.logger.debug(`No API key configured, accepting ${req.method} ${req.originalUrl}`, this.context);
      return next();
    }

    const header = req.headers['x-api-key'];
    const apiKey = Array.isArray(header) ? header[0] : header;

    if (!apiKey || apiKey !== expectedApiKey) {
      this.logger.warn(
        `API request rejected: ${apiKey ? 'invalid' : 'no'} API key - ${req.method} ${req.originalUrl} from ${req.ip}`,
        this.context
      );
      res.destroy();
      return;
    }

    next();
  }
}
