export { DesignValidator } from './DesignValidator';
