// Public barrel for @photo-search/core
// Recommended usage:
//   import { PhotoSearch, PhotoRepository, SearchState } from "@photo-search/core"
// Effect programs depend on PhotoSearchTag; plain UI code goes through makeController.

export * from './SearchState.js'
export * from './Repository.js'
export * from './PhotoSearch.js'
export * from './Config.js'
export * from './Controller.js'
