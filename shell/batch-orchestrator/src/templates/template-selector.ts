import type { PromptTemplate, TemplateCatalog } from "./template-catalog";
import type { TemplateSelector } from "../types";

/**
 * Rotates through the catalog's templates for each tier: unused templates
 * first, then the least used. Ties are broken with `random`.
 * Tiers without templates get null (custom prompt).
 */
export function createRotatingTemplateSelector(
  catalog: TemplateCatalog,
  random: () => number = Math.random,
): TemplateSelector {
  return ({ tier, usedTemplateIds }) => {
    const candidates = catalog.forTier(tier);
    if (candidates.length === 0) return null;

    const uses = new Map<string, number>();
    for (const id of usedTemplateIds) {
      uses.set(id, (uses.get(id) ?? 0) + 1);
    }

    const fewest = Math.min(...candidates.map((t) => uses.get(t.id) ?? 0));
    const pool = candidates.filter((t) => (uses.get(t.id) ?? 0) === fewest);
    return pickOne(pool, random);
  };
}

function pickOne(pool: PromptTemplate[], random: () => number): PromptTemplate | null {
  const index = Math.min(Math.floor(random() * pool.length), pool.length - 1);
  return pool[index] ?? null;
}
