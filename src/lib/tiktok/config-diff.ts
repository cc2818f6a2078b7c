import type { AccountConfig, ConfigDiff, ConfigSnapshot, GlobalSettings } from "@/types/tiktok";

function sameTags(a: readonly string[], b: readonly string[]) {
  return a.length === b.length && a.every((tag, i) => tag === b[i]);
}

function sameMetadata(a: Readonly<AccountConfig>, b: Readonly<AccountConfig>) {
  return (
    a.username === b.username &&
    a.sessionId === b.sessionId &&
    a.targetIdc === b.targetIdc &&
    a.notes === b.notes &&
    sameTags(a.tags, b.tags)
  );
}

function sameSettings(a: Readonly<GlobalSettings>, b: Readonly<GlobalSettings>) {
  return (
    a.checkIntervalSeconds === b.checkIntervalSeconds &&
    a.maxConcurrentRecordings === b.maxConcurrentRecordings &&
    a.outputDirectory === b.outputDirectory &&
    a.sessionId === b.sessionId &&
    a.targetIdc === b.targetIdc &&
    a.signServer === b.signServer
  );
}

/**
 * Classifies every key of either snapshot into at most one bucket. A key whose
 * `enabled` flag flipped is reported as toggled even if other fields changed.
 */
export function diffSnapshots(previous: ConfigSnapshot, current: ConfigSnapshot): ConfigDiff {
  const diff: ConfigDiff = {
    added: [],
    removed: [],
    toggledOn: [],
    toggledOff: [],
    changedMetadata: [],
    settingsChanged: !sameSettings(previous.settings, current.settings),
  };

  for (const [key, account] of current.accounts) {
    const before = previous.accounts.get(key);
    if (!before) diff.added.push(key);
    else if (before.enabled !== account.enabled) (account.enabled ? diff.toggledOn : diff.toggledOff).push(key);
    else if (!sameMetadata(before, account)) diff.changedMetadata.push(key);
  }

  for (const key of previous.accounts.keys()) {
    if (!current.accounts.has(key)) diff.removed.push(key);
  }

  return diff;
}

export function isEmptyDiff(diff: ConfigDiff) {
  return (
    !diff.settingsChanged &&
    diff.added.length === 0 &&
    diff.removed.length === 0 &&
    diff.toggledOn.length === 0 &&
    diff.toggledOff.length === 0 &&
    diff.changedMetadata.length === 0
  );
}

export function describeDiff(diff: ConfigDiff) {
  const parts: string[] = [];
  if (diff.added.length) parts.push(`added: ${diff.added.join(", ")}`);
  if (diff.removed.length) parts.push(`removed: ${diff.removed.join(", ")}`);
  if (diff.toggledOn.length) parts.push(`enabled: ${diff.toggledOn.join(", ")}`);
  if (diff.toggledOff.length) parts.push(`disabled: ${diff.toggledOff.join(", ")}`);
  if (diff.changedMetadata.length) parts.push(`changed: ${diff.changedMetadata.join(", ")}`);
  if (diff.settingsChanged) parts.push("settings changed");
  return parts.length ? parts.join("; ") : "no changes";
}
