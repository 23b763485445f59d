export { fastSin, INV_TWO_PI } from './audio/dsp/fast-sine';
export { SIN_TABLE_SIZE } from './audio/dsp/sin-table';
