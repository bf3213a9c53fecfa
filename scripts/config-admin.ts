import dotenv from 'dotenv';
import { ConfigAdminClient, runConfigAdmin } from '../src/cli/configAdminClient';

dotenv.config();

const client = new ConfigAdminClient({
  baseUrl: process.env.API_BASE_URL || 'http://localhost:8000',
  apiKey: process.env.CONFIG_API_KEY,
  sessionId: process.env.SESSION_ID
});

runConfigAdmin(process.argv.slice(2), client, line => process.stdout.write(`${line}\n`), process.env.JWT_SECRET_KEY)
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
