export { parseInstancesText, loadInstances, formatInstancesText } from './instances.js';
