import type { Category, ClassificationPolicy } from './types';

export const CATEGORY_ORDER: readonly Category[] = ['dts', 'config', 'drivers', 'script', 'patch', 'other'];

const DTS_EXTENSIONS = ['.dts', '.dtsi'];
const CONFIG_MARKERS = ['config', 'kconfig'];
const DRIVER_EXTENSIONS = ['.c', '.h'];
const SCRIPT_EXTENSIONS = ['.sh', '.py', '.pl'];
const SCRIPT_MARKERS = ['build', 'script'];

export interface Classification {
  buckets: Record<Category, string[]>;
  uncategorized: string[];
}

/**
 * Maps a path to its category. Rules are checked in order and the first match
 * wins; only the path string is inspected. Under the `minimal` policy paths
 * that match none of the first four rules return `null`.
 */
export function classify(file: string, policy: ClassificationPolicy = 'full'): Category | null {
  const lower = file.toLowerCase();

  if (DTS_EXTENSIONS.some((ext) => file.endsWith(ext))) return 'dts';
  if (CONFIG_MARKERS.some((marker) => lower.includes(marker))) return 'config';
  if (file.startsWith('drivers/') || DRIVER_EXTENSIONS.some((ext) => file.endsWith(ext))) return 'drivers';
  if (
    SCRIPT_EXTENSIONS.some((ext) => file.endsWith(ext)) ||
    SCRIPT_MARKERS.some((marker) => lower.includes(marker))
  ) {
    return 'script';
  }

  if (policy === 'minimal') return null;
  if (file.endsWith('.patch')) return 'patch';
  return 'other';
}

export function classifyFiles(files: string[], policy: ClassificationPolicy = 'full'): Classification {
  const buckets: Record<Category, string[]> = {
    dts: [],
    config: [],
    drivers: [],
    script: [],
    patch: [],
    other: [],
  };
  const uncategorized: string[] = [];

  for (const file of files) {
    const category = classify(file, policy);
    if (category) {
      buckets[category].push(file);
    } else {
      uncategorized.push(file);
    }
  }

  return { buckets, uncategorized };
}
