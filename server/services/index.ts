import type { DataStore } from '../repositories/types';
import { KnexDataStore } from '../repositories/knex-data-store';
import { ServiceSettings, settingsFromConfig } from './base.service';
import { InvoiceService } from './invoice.service';
import { PaymentService } from './payment.service';
import { PrintJobService } from './print-job.service';
import { ProductionStageService } from './production-stage.service';
import { WeightPricingService } from './weight-pricing.service';

export interface Services {
  weightPricing: WeightPricingService;
  invoices: InvoiceService;
  payments: PaymentService;
  printJobs: PrintJobService;
  stages: ProductionStageService;
}

export function createServices(
  store: DataStore = new KnexDataStore(),
  settings: ServiceSettings = settingsFromConfig()
): Services {
  return {
    weightPricing: new WeightPricingService(store, settings),
    invoices: new InvoiceService(store, settings),
    payments: new PaymentService(store, settings),
    printJobs: new PrintJobService(store, settings),
    stages: new ProductionStageService(store, settings),
  };
}
