export { printTable } from './table';
export { OutputRenderer } from './renderer';
export type { JsonScanReport } from './renderer';
