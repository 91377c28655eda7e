import { readFileSync } from "node:fs";
import * as core from "@actions/core";
import { z } from "zod";
import { ConfigurationError, describeError } from "./errors.js";
import type { Category, Registry, Source } from "./sources/types.js";

const REPO_ID = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

const RepoEntrySchema = z.union([
  z.string().regex(REPO_ID, 'Must be in format "owner/name"'),
  z.object({
    repo: z.string().regex(REPO_ID, 'Must be in format "owner/name"'),
    weight: z.number().nonnegative().default(1),
    display_name: z.string().min(1).optional(),
    friendly_labels: z.array(z.string().min(1)).default([]),
  }),
]);

const CategorySchema = z.object({
  label: z.string().min(1),
  icon: z.string().default(""),
  repos: z.array(RepoEntrySchema),
});

export const RegistryFileSchema = z.object({
  categories: z
    .record(z.string().min(1), CategorySchema)
    .refine((c) => Object.keys(c).length > 0, "At least one category is required"),
});

type RepoObject = Exclude<z.infer<typeof RepoEntrySchema>, string>;

export function parseRegistry(raw: unknown): Registry {
  const result = RegistryFileSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid registry: ${details}`);
  }

  const categories: Category[] = [];
  const sources: Source[] = [];
  const seen = new Map<string, string>();

  for (const [key, category] of Object.entries(result.data.categories)) {
    categories.push({ key, label: category.label, icon: category.icon });

    for (const entry of category.repos) {
      const item: RepoObject =
        typeof entry === "string"
          ? { repo: entry, weight: 1, friendly_labels: [] }
          : entry;
      const id = item.repo.toLowerCase();

      // A repo listed under several categories keeps the first one
      const first = seen.get(id);
      if (first !== undefined) {
        core.warning(
          `${item.repo} is listed under "${first}" and "${key}", keeping "${first}"`
        );
        continue;
      }
      seen.set(id, key);

      const [owner, name] = item.repo.split("/");
      sources.push({
        repo: item.repo,
        owner,
        name,
        category: key,
        categoryLabel: category.label,
        displayName: item.display_name ?? item.repo,
        weight: item.weight,
        friendlyLabels: item.friendly_labels,
      });
    }
  }

  return { categories, sources };
}

export function loadRegistry(filePath: string): Registry {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(
      `Could not read registry "${filePath}": ${describeError(error)}`
    );
  }
  return parseRegistry(raw);
}
