import 'dotenv/config'
import { openStore } from '../src/index.js'

/**
 * Destroys and recreates the fund tables.
 *
 * Normal runs only ever create missing tables; this script is the one
 * place that drops data, so call it deliberately (`npm run db:reset`).
 */
function run() {
  const store = openStore()
  try {
    store.reset()
    console.log('Database reset: funds and dollar_changes recreated empty.')
  } finally {
    store.close()
  }
}

try {
  run()
} catch (error) {
  console.error('Reset failed:', error)
  process.exit(1)
}
