import 'dotenv/config';
import { main } from './main.js';

main(process.env)
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error('[server] fatal startup error', err);
    process.exit(1);
  });
