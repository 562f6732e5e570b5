import { defineConfig } from '../../tools/vitest-config/src/index';

export default defineConfig('pdf-parser');
