import { PortfolioEngineErrorCode } from '../errors/portfolio-engine.errors';

// Body returned for engine failures
export interface HttpExceptionResponse {
  statusCode: number;
  message: string;
  error: PortfolioEngineErrorCode;
  timestamp: string;
  path: string;
}
