export { QmdRenderer, IMAGES_DIR, assetFileName } from './qmd-renderer';
