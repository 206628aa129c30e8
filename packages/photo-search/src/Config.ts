export type { PhotoSearchConfigShape, PhotoSearchConfigSnapshot } from './internal/config/config.js'
export { PhotoSearchConfig, PhotoSearchConfigTag } from './internal/config/config.js'
