import dotenv from 'dotenv';

import { createSiteApp } from './app';
import { readDirectoryConfigFromEnv } from './services/directoryConfig';

dotenv.config();

function main(): void {
  const config = readDirectoryConfigFromEnv();
  const app = createSiteApp({ publicRootPath: config.publicRootPath });

  app.listen(config.port, () => {
    console.log(`Game Directory serving ${config.publicRootPath} on http://localhost:${config.port}`);
  });
}

main();
