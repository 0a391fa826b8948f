// src/manifest/manifest.ts
// Template naming, duplicate detection and lookup by key

import * as path from "path";
import { randomBytes } from "crypto";
import { DuplicateTemplateError } from "../core/errors";
import { done, duplicateTemplate, unknownTemplateRoot } from "../outcome/constructors";
import type { Outcome } from "../outcome/outcome";
import type { Store } from "../core/tree/store";

// =========================================================================
// Types
// =========================================================================

/** A directory of templates, addressed by `prefix`. */
export type TemplatesRoot = {
  prefix: string;
  path: string;
};

/** A template file found under one of the roots. */
export type TemplatePath = {
  prefix: string;
  path: string;
};

/** A planned template: its generated name and its lookup key. */
export type TemplateDef = {
  name: string;
  prefix: string;
  key: string;
  path: string;
};

export type RenderFn = (store: Store) => void;

export type Template = {
  key: string;
  prefix: string;
  render: RenderFn;
  /** Partials are rendered into a parent and are left out of `list()` */
  partial: boolean;
};

// =========================================================================
// Naming
// =========================================================================

/**
 * Logical name of a template: its path relative to the templates root,
 * `/`-separated, with the extension removed.
 *
 * `templateKey("/app/templates", "/app/templates/users/index.html")` is
 * `"users/index"`.
 */
export function templateKey(templatesRoot: string, templatePath: string): string {
  const relative = path.relative(templatesRoot, templatePath);
  const ext = path.extname(relative);
  const stem = ext ? relative.slice(0, -ext.length) : relative;
  return stem.split(path.sep).join("/");
}

/** Identifier for a compiled template, unique per call. */
export function generateTemplateName(): string {
  return `tpl_${randomBytes(8).toString("hex")}`;
}

/**
 * Plan a name and key for every template path. Two paths under the same
 * prefix that map to the same key fail with `DuplicateTemplate`; the same key
 * under different prefixes is allowed. A prefix without a root fails too.
 */
export function validateTemplatePaths(
  roots: readonly TemplatesRoot[],
  paths: readonly TemplatePath[],
  nameFor: () => string = generateTemplateName
): Outcome<TemplateDef[]> {
  const rootByPrefix = new Map<string, string>();
  for (const root of roots) rootByPrefix.set(root.prefix, root.path);

  const seen = new Map<string, Set<string>>();
  const defs: TemplateDef[] = [];

  for (const tp of paths) {
    const rootPath = rootByPrefix.get(tp.prefix);
    if (rootPath === undefined) return unknownTemplateRoot(tp.prefix, tp.path);
    const key = templateKey(rootPath, tp.path);

    let keys = seen.get(tp.prefix);
    if (!keys) {
      keys = new Set();
      seen.set(tp.prefix, keys);
    }
    if (keys.has(key)) return duplicateTemplate(tp.path, tp.prefix, key);
    keys.add(key);

    defs.push({ name: nameFor(), prefix: tp.prefix, key, path: tp.path });
  }

  return done(defs);
}

// =========================================================================
// Registry
// =========================================================================

/**
 * Templates grouped by prefix. Lookups without a prefix search prefixes in
 * registration order.
 */
export class TemplateRegistry {
  private byPrefix: Map<string, Map<string, Template>> = new Map();

  /**
   * Register a template. Throws `DuplicateTemplate` on a repeated prefix/key.
   */
  register(template: Template): void {
    let scope = this.byPrefix.get(template.prefix);
    if (!scope) {
      scope = new Map();
      this.byPrefix.set(template.prefix, scope);
    }
    if (scope.has(template.key)) {
      throw new DuplicateTemplateError(`${template.prefix}:${template.key}`);
    }
    scope.set(template.key, template);
  }

  find(key: string): Template | null {
    for (const scope of this.byPrefix.values()) {
      const template = scope.get(key);
      if (template) return template;
    }
    return null;
  }

  /** Find a template within one prefix only. */
  findPrefixed(prefix: string, key: string): Template | null {
    return this.byPrefix.get(prefix)?.get(key) ?? null;
  }

  /** Every non-partial template, in registration order. */
  list(): Template[] {
    const out: Template[] = [];
    for (const scope of this.byPrefix.values()) {
      for (const template of scope.values()) {
        if (!template.partial) out.push(template);
      }
    }
    return out;
  }
}
