export { escapeLatex } from './filters';
export {
  DEFAULT_TEMPLATE_DIR,
  LATEX_TAGS,
  NunjucksRenderer,
  type NunjucksRendererOptions,
} from './NunjucksRenderer';
