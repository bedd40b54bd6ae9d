import 'dotenv/config';
import http from 'http';
import { createApp } from './app';
import { config, connectDatastores } from './config';
import { mongoRepositories } from './repositories/mongo';
import { createHttpProbe } from './lib/http';
import { FileStorage, LocalFileStorage, ObjectFileStorage } from './lib/storage';
import { createServices } from './services';
import { createDefaultProcessorRegistry } from './services/processors';
import logger from './lib/logger';
import { describeError } from './lib/errors';

async function main(): Promise<void> {
  await connectDatastores();

  const httpProbe = createHttpProbe(config.metadataHttpTimeout);
  const storage: FileStorage =
    config.fileStorage === 'object'
      ? new ObjectFileStorage(config.objectStorageBaseUrl, httpProbe)
      : new LocalFileStorage(config.mediaRoot, config.mediaUrl);

  const services = createServices({
    repositories: mongoRepositories,
    processors: createDefaultProcessorRegistry(),
    http: httpProbe,
    storage,
    agreementValidForHours: config.agreementValidForHours,
    persistentIdMaxAttempts: config.persistentIdMaxAttempts
  });

  const server = http.createServer(createApp(services, { adminToken: config.adminSecretToken }));
  server.listen(config.port, () => {
    logger.info(`Server listening on ${config.port}`);
  });
}

main().catch((err: unknown) => {
  logger.error('Server failed to start', { err: describeError(err) });
  process.exit(1);
});
