export * from './driver';
export * from './file-store';
