import type { Express } from 'express';
import { createApp, createServices, type AppServices } from '../../src/app';
import type { StockLedger } from '../../src/repositories/stock.ledger.types';
import { FAST_RETRY, ledgerWith } from './ledger-fixtures';

export interface TestApp {
  app: Express;
  services: AppServices;
}

export function appOver(ledger: StockLedger): TestApp {
  const services = createServices(ledger, FAST_RETRY);
  return { app: createApp(services), services };
}

export async function appWith(levels: Record<string, number>): Promise<TestApp> {
  return appOver(await ledgerWith(levels));
}
