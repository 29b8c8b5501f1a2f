/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/api/.env.local explicitly so the API does not pick up an
 * unrelated .env from the monorepo root.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const envPath = resolve(__dirname, '..', '.env.local')

config({ path: envPath })
