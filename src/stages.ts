import type { Stage, StageInfo } from "./types";

/**
 * Convert a stage token into display text: underscores become spaces and
 * every word is capitalized, e.g. `ARTIFACT_REGISTRY` → `Artifact Registry`.
 */
export function toTitleCase(token: string): string {
  return token
    .replace(/_/g, " ")
    .toLowerCase()
    .replace(
      /(^|[^a-z])([a-z])/g,
      (_match, before: string, letter: string) => before + letter.toUpperCase(),
    );
}

export function stageFromInfo(info: StageInfo): Stage {
  return { key: info.name, label: `[${toTitleCase(info.name)}]` };
}

/**
 * Build the ordered stage set from the stages the server reported, followed
 * by extra stages the caller knows may appear later (rollbacks, for
 * instance). Only the first stage with a given key is kept.
 */
export function buildStageSet(
  infos: StageInfo[],
  extraStages: readonly Stage[] = [],
): Stage[] {
  const stages: Stage[] = [];
  const keys = new Set<string>();

  for (const stage of [...infos.map(stageFromInfo), ...extraStages]) {
    if (!keys.has(stage.key)) {
      keys.add(stage.key);
      stages.push(stage);
    }
  }

  return stages;
}
