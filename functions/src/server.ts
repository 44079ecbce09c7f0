import * as functions from 'firebase-functions';
import { createApp } from './app';
import { dataConfig, serverConfig } from './config';
import { loadMedicineData } from './services/catalog/catalogLoader';
import { createServiceContainer } from './services/serviceContainer';
import { initSentry } from './utils/sentry';

// Standalone entry point for running the API as a plain Node.js process.
initSentry();

const services = createServiceContainer({
  data: loadMedicineData({ dataDir: dataConfig.dataDir }),
});

createApp(services).listen(serverConfig.port, () => {
  functions.logger.info(`[server] MedVoice API listening on port ${serverConfig.port}`);
});
