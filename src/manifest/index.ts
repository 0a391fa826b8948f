export {
  templateKey,
  generateTemplateName,
  validateTemplatePaths,
  TemplateRegistry,
  type TemplatesRoot,
  type TemplatePath,
  type TemplateDef,
  type Template,
  type RenderFn,
} from "./manifest";
export { renderTemplate, type RenderOptions } from "./render";
