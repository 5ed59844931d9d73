import { describe, expect, it } from 'vitest';
import {
  buildReportRow,
  buildReportRows,
  findMatchingPdb,
  isSubsetMatch,
  owningReplicaSet,
  resolvePriority,
} from '../../src/domain/disruptions.js';
import type { PdbRecord, PodRecord, PriorityClassRecord } from '../../src/domain/types.js';

const pod = (overrides: Partial<PodRecord> = {}): PodRecord => ({
  name: 'api-7f',
  namespace: 'prod',
  labels: { app: 'api' },
  ownerReferences: [{ kind: 'ReplicaSet', name: 'api-7f8d' }],
  priorityClassName: 'high',
  ...overrides,
});

const pdb = (overrides: Partial<PdbRecord> = {}): PdbRecord => ({
  name: 'api-pdb',
  namespace: 'prod',
  matchLabels: { app: 'api' },
  minAvailable: 2,
  ...overrides,
});

const priorityClasses: PriorityClassRecord[] = [
  { name: 'high', value: 1000000 },
  { name: 'low', value: -10 },
];

describe('isSubsetMatch', () => {
  it('matches when every selector label is present with the same value', () => {
    expect(isSubsetMatch({ app: 'api' }, { app: 'api', tier: 'web' })).toBe(true);
    expect(isSubsetMatch({ app: 'api', tier: 'web' }, { app: 'api', tier: 'web' })).toBe(true);
  });

  it('rejects a differing value or a missing key', () => {
    expect(isSubsetMatch({ app: 'api' }, { app: 'worker' })).toBe(false);
    expect(isSubsetMatch({ app: 'api', tier: 'web' }, { app: 'api' })).toBe(false);
  });

  it('never matches with an empty selector', () => {
    expect(isSubsetMatch({}, { app: 'api' })).toBe(false);
    expect(isSubsetMatch({}, {})).toBe(false);
  });

  it('treats an empty-string label value as a real value', () => {
    expect(isSubsetMatch({ canary: '' }, { canary: '' })).toBe(true);
    expect(isSubsetMatch({ canary: '' }, {})).toBe(false);
  });

  it('ignores inherited object properties', () => {
    expect(isSubsetMatch({ toString: 'x' }, {})).toBe(false);
  });
});

describe('findMatchingPdb', () => {
  it('returns the first matching PDB in listing order', () => {
    const pdbs = [pdb({ name: 'first' }), pdb({ name: 'second', matchLabels: { app: 'api', tier: 'web' } })];
    const found = findMatchingPdb(pod({ labels: { app: 'api', tier: 'web' } }), pdbs);
    expect(found?.name).toBe('first');
  });

  it('does not rank by selector specificity', () => {
    const pdbs = [pdb({ name: 'broad' }), pdb({ name: 'narrow', matchLabels: { app: 'api', tier: 'web' } })];
    expect(findMatchingPdb(pod({ labels: { app: 'api', tier: 'web' } }), pdbs)?.name).toBe('broad');
    expect(findMatchingPdb(pod({ labels: { app: 'api', tier: 'web' } }), [...pdbs].reverse())?.name).toBe('narrow');
  });

  it('only considers PDBs in the pod namespace', () => {
    expect(findMatchingPdb(pod(), [pdb({ namespace: 'staging' })])).toBeUndefined();
  });

  it('skips PDBs without selector labels', () => {
    const pdbs = [pdb({ name: 'empty', matchLabels: {} }), pdb({ name: 'api-pdb' })];
    expect(findMatchingPdb(pod(), pdbs)?.name).toBe('api-pdb');
  });

  it('never matches a pod without labels', () => {
    const pdbs = [pdb({ matchLabels: {} }), pdb()];
    expect(findMatchingPdb(pod({ labels: {} }), pdbs)).toBeUndefined();
  });
});

describe('resolvePriority', () => {
  it('looks up the value by exact name', () => {
    expect(resolvePriority('high', priorityClasses)).toBe(1000000);
    expect(resolvePriority('low', priorityClasses)).toBe(-10);
  });

  it('returns undefined for an absent or unknown name', () => {
    expect(resolvePriority(undefined, priorityClasses)).toBeUndefined();
    expect(resolvePriority('High', priorityClasses)).toBeUndefined();
  });
});

describe('owningReplicaSet', () => {
  it('picks the first ReplicaSet owner', () => {
    const owned = pod({
      ownerReferences: [
        { kind: 'Node', name: 'node-a' },
        { kind: 'ReplicaSet', name: 'rs-1' },
        { kind: 'ReplicaSet', name: 'rs-2' },
      ],
    });
    expect(owningReplicaSet(owned)).toBe('rs-1');
  });

  it('returns undefined when no ReplicaSet owns the pod', () => {
    expect(owningReplicaSet(pod({ ownerReferences: [{ kind: 'StatefulSet', name: 'db' }] }))).toBeUndefined();
    expect(owningReplicaSet(pod({ ownerReferences: [] }))).toBeUndefined();
  });
});

describe('buildReportRow', () => {
  it('assembles the api-7f row', () => {
    expect(buildReportRow(pod(), [pdb()], priorityClasses)).toEqual({
      podName: 'api-7f',
      namespace: 'prod',
      replicaSet: 'api-7f8d',
      priorityClassName: 'high',
      priorityValue: 1000000,
      pdbName: 'api-pdb',
      minAvailable: 2,
      maxUnavailable: undefined,
    });
  });

  it('leaves every derived field absent for a bare pod', () => {
    const bare = pod({ name: 'bare', labels: {}, ownerReferences: [], priorityClassName: undefined });
    expect(buildReportRow(bare, [pdb()], priorityClasses)).toEqual({
      podName: 'bare',
      namespace: 'prod',
      replicaSet: undefined,
      priorityClassName: undefined,
      priorityValue: undefined,
      pdbName: undefined,
      minAvailable: undefined,
      maxUnavailable: undefined,
    });
  });

  it('keeps an unresolvable priority class name', () => {
    const row = buildReportRow(pod({ priorityClassName: 'gone' }), [], priorityClasses);
    expect(row.priorityClassName).toBe('gone');
    expect(row.priorityValue).toBeUndefined();
  });
});

describe('buildReportRows', () => {
  it('produces one row per pod in input order, even with several matching PDBs', () => {
    const pods = [pod({ name: 'c' }), pod({ name: 'a', labels: {} }), pod({ name: 'b', namespace: 'other' })];
    const pdbs = [pdb({ name: 'one' }), pdb({ name: 'two' })];
    const rows = buildReportRows({ pods, pdbs, priorityClasses });
    expect(rows.map((row) => row.podName)).toEqual(['c', 'a', 'b']);
    expect(rows.map((row) => row.pdbName)).toEqual(['one', undefined, undefined]);
  });

  it('returns no rows for an empty cluster', () => {
    expect(buildReportRows({ pods: [], pdbs: [pdb()], priorityClasses })).toEqual([]);
  });

  it('matches every pod whose labels contain a same-namespace selector', () => {
    const pdbs = [
      pdb({ name: 'a', matchLabels: { app: 'a' } }),
      pdb({ name: 'b', matchLabels: { app: 'b', track: 'stable' } }),
      pdb({ name: 'c', namespace: 'dev', matchLabels: { app: 'b' } }),
    ];
    const pods = [
      pod({ name: 'p1', labels: { app: 'a', extra: '1' } }),
      pod({ name: 'p2', labels: { app: 'b', track: 'stable' } }),
      pod({ name: 'p3', namespace: 'dev', labels: { app: 'b', track: 'stable' } }),
    ];
    const rows = buildReportRows({ pods, pdbs, priorityClasses });
    expect(rows.map((row) => row.pdbName)).toEqual(['a', 'b', 'c']);
  });
});
