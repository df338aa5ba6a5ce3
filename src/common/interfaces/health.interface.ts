export interface HealthResponse {
  status: 'ok' | 'error';
  timestamp: string;
  uptime: number;
  service: string;
  ledgers: number;        // pairs with at least one applied trade
  ingestedTradeIds: number;
}
