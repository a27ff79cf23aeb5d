export { registerBuild } from './build.js';
export { registerDoctor } from './doctor.js';
export { registerHints } from './hints.js';
export { registerList } from './list.js';
export { registerVersion } from './version.js';
