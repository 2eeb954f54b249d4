export { listObjectKeys, collect } from './lister.js';
