export { SequelizeProgressStore } from './SequelizeProgressStore.js';
export type { SequelizeProgressStoreOptions } from './SequelizeProgressStore.js';
export { createSequelize } from './createSequelize.js';
export type { CreateSequelizeOptions } from './createSequelize.js';
export type { JobRow } from './models/JobModel.js';
export type { PartRow } from './models/PartModel.js';
