/**
 * libsodium-wrappers, loaded through its CommonJS build
 *
 * The package's ESM entry imports a libsodium.mjs it does not ship,
 * so `import sodium from 'libsodium-wrappers'` fails to resolve under Node.
 */

import { createRequire } from 'node:module'

type Sodium = typeof import('libsodium-wrappers')

const require = createRequire(import.meta.url)

const sodium: Sodium = require('libsodium-wrappers')

export default sodium
