import { onRequest } from 'firebase-functions/v2/https';
import { createApp } from './app';
import { dataConfig } from './config';
import { loadMedicineData } from './services/catalog/catalogLoader';
import { createServiceContainer } from './services/serviceContainer';
import { initSentry } from './utils/sentry';

// Initialize Sentry BEFORE other initializations
initSentry();

// The read model loads once per instance, before the first request is served.
const services = createServiceContainer({
  data: loadMedicineData({ dataDir: dataConfig.dataDir }),
});

const app = createApp(services);

export const api = onRequest(
  {
    timeoutSeconds: 60,
    memory: '256MiB',
    maxInstances: 10,
  },
  app,
);
