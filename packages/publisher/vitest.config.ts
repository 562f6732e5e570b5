import { defineConfig } from '../../tools/vitest-config/src/index';

export default defineConfig('publisher');
