export { mapObjectPath, mapObjects } from './path-mapper.js';
