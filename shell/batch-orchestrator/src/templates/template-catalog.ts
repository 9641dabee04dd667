import { z } from "@avatarflow/utils";
import { TierEnum } from "@avatarflow/content-store";
import type { Tier } from "@avatarflow/content-store";
import catalogData from "./catalog.json";

export const promptTemplateSchema = z.object({
  id: z.string().min(1),
  tier: TierEnum,
  category: z.string(),
  promptTemplate: z.string().min(1),
  pose: z.string(),
  lighting: z.string(),
  angle: z.string(),
  tags: z.array(z.string()).default([]),
});

export type PromptTemplate = z.infer<typeof promptTemplateSchema>;

export const templateCatalogSchema = z.object({
  version: z.number().int(),
  templates: z.array(promptTemplateSchema),
});

export class TemplateCatalog {
  private readonly byId: Map<string, PromptTemplate>;

  constructor(public readonly templates: readonly PromptTemplate[]) {
    this.byId = new Map();
    for (const template of templates) {
      if (this.byId.has(template.id)) {
        throw new Error(`Duplicate template id: ${template.id}`);
      }
      this.byId.set(template.id, template);
    }
  }

  public static fromJson(data: unknown): TemplateCatalog {
    return new TemplateCatalog(templateCatalogSchema.parse(data).templates);
  }

  public get(id: string): PromptTemplate | undefined {
    return this.byId.get(id);
  }

  public forTier(tier: Tier): PromptTemplate[] {
    return this.templates.filter((t) => t.tier === tier);
  }

  public categories(): string[] {
    return [...new Set(this.templates.map((t) => t.category))].sort();
  }
}

let defaultCatalog: TemplateCatalog | null = null;

/**
 * The bundled catalog
 */
export function getDefaultTemplateCatalog(): TemplateCatalog {
  defaultCatalog ??= TemplateCatalog.fromJson(catalogData);
  return defaultCatalog;
}

export function buildPrompt(template: PromptTemplate): string {
  return [template.promptTemplate, template.lighting, template.angle, template.pose]
    .filter((part) => part.length > 0)
    .join(", ");
}
