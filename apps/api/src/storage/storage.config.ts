import { join, resolve } from 'node:path';

export const STORAGE_CONFIG = Symbol('STORAGE_CONFIG');

export type StorageConfig = {
  dataDir: string;
  holdingsFile: string;
  tradesFile: string;
};

export const storageConfig = (
  dataDir = process.env.DATA_DIR ?? './data',
): StorageConfig => {
  const dir = resolve(dataDir);
  return {
    dataDir: dir,
    holdingsFile: join(dir, 'consolidated.csv'),
    tradesFile: join(dir, 'trades.csv'),
  };
};
