import { envString } from '../utils/env';

export const DB_PATH = envString('DB_PATH', './data/docchat.sqlite');
export const SOURCE_DIR = envString('SOURCE_DIR', './documents');
