import type { Migration } from '../migrations.js';
import { migration001 } from './001-vector-index.js';
import { migration002 } from './002-conversations.js';

export const allMigrations: Migration[] = [migration001, migration002];
