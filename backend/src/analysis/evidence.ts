// Literature evidence lookup backed by a JSON parameter catalogue

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { EvidenceProvider } from "../pipeline/steps.js";
import { EvidenceItemSchema, ModelTypeSchema } from "./types.js";
import type { EvidenceItem, EvidenceSearchResult, ParsedAttributes } from "./types.js";

export const EvidenceCatalogueSchema = z.object({
  requirements: z.record(ModelTypeSchema, z.array(z.string())),
  parameters: z.array(EvidenceItemSchema),
});
export type EvidenceCatalogue = z.infer<typeof EvidenceCatalogueSchema>;

export const DEFAULT_CATALOGUE_PATH = fileURLToPath(new URL("../../data/evidence.json", import.meta.url));

export function loadEvidenceCatalogue(path: string = DEFAULT_CATALOGUE_PATH): EvidenceCatalogue {
  const raw = readFileSync(path, "utf-8");
  const parsed = EvidenceCatalogueSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Evidence catalogue ${path} is invalid: ${parsed.error.message}`);
  }
  return parsed.data;
}

export class CatalogueEvidenceProvider implements EvidenceProvider {
  private byName: Map<string, EvidenceItem>;

  constructor(private catalogue: EvidenceCatalogue) {
    this.byName = new Map(catalogue.parameters.map((p) => [p.parameter, p]));
  }

  async search(attributes: ParsedAttributes): Promise<EvidenceSearchResult> {
    const required = this.catalogue.requirements[attributes.modelType] ?? [];
    const evidence: EvidenceItem[] = [];
    const missing: string[] = [];

    for (const name of required) {
      const item = this.byName.get(name);
      if (item) evidence.push({ ...item });
      else missing.push(name);
    }

    const sources = Array.from(new Set(evidence.map((e) => e.source)));
    return { evidence, sources, missing };
  }
}
