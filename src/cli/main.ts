import { createCli } from './index';

process.exitCode = await createCli().execute();
