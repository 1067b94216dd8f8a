/**
 * The bundled data/ directory: two levels above the sources in
 * development, one level above the built bundle in dist/.
 */

import { existsSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'

const here = dirname(fileURLToPath(import.meta.url))
const candidates = [join(here, '..', '..', 'data'), join(here, '..', 'data')]

export const DATA_DIR = candidates.find((dir) => existsSync(join(dir, 'rules.json'))) ?? candidates[0]
