export type { PhotoSearchController, PhotoSearchControllerOptions } from './internal/controller/controller.js'
export { make as makeController } from './internal/controller/controller.js'
export type { ExternalStore } from './internal/store/searchStateExternalStore.js'
