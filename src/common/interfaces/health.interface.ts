export interface HealthResponse {
  status: 'healthy';
  model: string;
  llmConfigured: boolean;
  timestamp: string;
  version: string;
  uptime: number;
}
