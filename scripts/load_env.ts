/**
 * Loads .env.local first, then .env for anything still missing.
 * Imported first by every script so modules that read the environment at load time see it.
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
