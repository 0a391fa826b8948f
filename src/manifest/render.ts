import { UnknownTemplateError } from "../core/errors";
import type { Store } from "../core/tree/store";
import type { ObjectValue } from "../core/tree/value";
import { nullTrace, type TraceSink } from "../ports/trace";
import type { TemplateRegistry } from "./manifest";

export type RenderOptions = {
  /** Look the key up in this prefix only */
  prefix?: string;
  /** Shadows the root for the duration of the render; `null` clears the current one */
  overlay?: ObjectValue | null;
  /** Drop one trailing newline from the output after rendering */
  chomp?: boolean;
  trace?: TraceSink;
};

/**
 * Render the template registered under `key` into `store`'s output buffer.
 * Partials are chomped unless `chomp` says otherwise.
 */
export function renderTemplate(
  registry: TemplateRegistry,
  store: Store,
  key: string,
  options: RenderOptions = {}
): string {
  const template = options.prefix === undefined
    ? registry.find(key)
    : registry.findPrefixed(options.prefix, key);
  if (!template) throw new UnknownTemplateError(key);

  const trace = options.trace ?? nullTrace;
  const start = Date.now();

  const overlay = "overlay" in options ? options.overlay ?? null : store.overlay;
  store.withOverlay(overlay, () => template.render(store));
  if (options.chomp ?? template.partial) store.chompOutputBuffer();

  trace.emit({ tag: "E_TemplateRender", key, durationMs: Date.now() - start });
  return store.output();
}
