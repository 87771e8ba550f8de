export { SampleSizeError, ErrorCode, isSampleSizeError, wrapError } from './SampleSizeError';
