import type { ClassificationPolicy, CommitFields, Vocabulary } from './types';

export const VALID_CPUS = ['imx8mm', 'imx8mp', 'imx93'] as const;
export const VALID_MACHINES = ['ROM-5721', 'ROM-5722', 'ROM-2820'] as const;
export const VALID_TYPES = ['dts', 'drivers', 'config', 'kconfig', 'script', 'patch'] as const;

export const UNKNOWN = 'unknown';

export function vocabularyFor(policy: ClassificationPolicy): Vocabulary {
  return {
    cpus: VALID_CPUS,
    machines: VALID_MACHINES,
    types: policy === 'minimal' ? VALID_TYPES.filter((t) => t !== 'patch') : VALID_TYPES,
  };
}

export function isUndetermined(value: string): boolean {
  const trimmed = value.trim();
  return trimmed === '' || trimmed.toLowerCase() === UNKNOWN;
}

export function assembleCommitMessage(fields: CommitFields): string {
  return `[${fields.cpu}][${fields.machine}][${fields.type}] ${fields.title}\n\n${fields.details.join('\n')}`;
}
