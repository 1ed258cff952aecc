/**
 * AssessmentCatalog loader for the assessment knowledge file (JSONL).
 */

import { readFileSync } from "fs";

export interface AssessmentEntry {
  id: string;
  name: string;
  url: string;
  description: string;
  test_types: string[];
  duration_minutes?: number;
  remote_testing: boolean;
  adaptive: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toEntry(parsed: unknown): AssessmentEntry | null {
  if (!isRecord(parsed)) return null;
  const { id, name, url, description, test_types, duration_minutes } = parsed;
  if (typeof id !== "string" || !id) return null;
  if (typeof name !== "string" || !name) return null;
  if (typeof description !== "string" || !description) return null;

  return {
    id,
    name,
    url: typeof url === "string" ? url : "",
    description,
    test_types: Array.isArray(test_types)
      ? test_types.filter((t): t is string => typeof t === "string")
      : [],
    duration_minutes:
      typeof duration_minutes === "number" ? duration_minutes : undefined,
    remote_testing: parsed.remote_testing === true,
    adaptive: parsed.adaptive === true,
  };
}

/**
 * Render an entry as the text that gets embedded and handed to the model.
 */
export function toDocumentText(entry: AssessmentEntry): string {
  const lines = [
    `Assessment: ${entry.name}`,
    `Description: ${entry.description}`,
    `Test types: ${entry.test_types.length > 0 ? entry.test_types.join(", ") : "N/A"}`,
    `Duration: ${
      entry.duration_minutes !== undefined
        ? `${entry.duration_minutes} minutes`
        : "N/A"
    }`,
    `Remote testing: ${entry.remote_testing ? "Yes" : "No"}`,
    `Adaptive/IRT: ${entry.adaptive ? "Yes" : "No"}`,
  ];
  if (entry.url) {
    lines.push(`URL: ${entry.url}`);
  }
  return lines.join("\n");
}

export class AssessmentCatalog {
  entries: AssessmentEntry[] = [];

  constructor(private catalogPath: string) {}

  load(): void {
    const raw = readFileSync(this.catalogPath, "utf8");
    const lines = raw.split(/\r?\n/);
    const entries: AssessmentEntry[] = [];
    const seen = new Set<string>();

    for (const line of lines) {
      const trimmed = line.trim();
      if (!trimmed) continue;
      try {
        const entry = toEntry(JSON.parse(trimmed));
        if (entry && seen.has(entry.id)) {
          console.warn(`[Catalog] Skipping duplicate id: ${entry.id}`);
        } else if (entry) {
          seen.add(entry.id);
          entries.push(entry);
        } else {
          console.warn("[Catalog] Skipping incomplete entry:", trimmed.slice(0, 80));
        }
      } catch (error) {
        console.warn("[Catalog] Skipping invalid line:", error);
      }
    }

    this.entries = entries;
  }

  getPath(): string {
    return this.catalogPath;
  }
}
