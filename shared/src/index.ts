export * from './protocol';
export * from './types';
export * from './environment';
export { RecordLog } from './recordLog';
