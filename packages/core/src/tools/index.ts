export { LocalFileAccess } from './file-access.js';
export { SpawnProcessRunner } from './process-runner.js';
