export interface ErrorEnvelope {
  success: false;
  statusCode: number;
  error: string;
  details?: string[];
  path: string;
  timestamp: string;
}
