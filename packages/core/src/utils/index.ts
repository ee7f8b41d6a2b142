export { generateUUID } from './uuid';
export { Mutex, type MutexRelease } from './mutex';
export { validateCoordinatorOptions, validateSavepointPrefix } from './validation';
