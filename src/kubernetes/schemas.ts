import { z } from 'zod';
import type { PdbRecord, PodRecord, PriorityClassRecord } from '../domain/types.js';

// kubectl emits `null` for some empty fields, so optional fields accept both.
const labelsSchema = z.record(z.string()).nullish();

const intOrStringSchema = z.union([z.number().int(), z.string()]);

const ownerReferenceSchema = z.object({
  kind: z.string(),
  name: z.string(),
});

const podSchema = z.object({
  metadata: z.object({
    name: z.string(),
    namespace: z.string(),
    labels: labelsSchema,
    ownerReferences: z.array(ownerReferenceSchema).nullish(),
  }),
  spec: z
    .object({
      priorityClassName: z.string().nullish(),
    })
    .nullish(),
});

const pdbSchema = z.object({
  metadata: z.object({
    name: z.string(),
    namespace: z.string(),
  }),
  spec: z
    .object({
      selector: z
        .object({
          matchLabels: labelsSchema,
        })
        .nullish(),
      minAvailable: intOrStringSchema.nullish(),
      maxUnavailable: intOrStringSchema.nullish(),
    })
    .nullish(),
});

const priorityClassSchema = z.object({
  metadata: z.object({
    name: z.string(),
  }),
  value: z.number().int(),
});

const listOf = <T extends z.ZodTypeAny>(item: T) =>
  z.object({
    items: z.array(item).nullish(),
  });

export const PodListSchema = listOf(podSchema).transform((list): PodRecord[] =>
  (list.items ?? []).map((pod) => ({
    name: pod.metadata.name,
    namespace: pod.metadata.namespace,
    labels: pod.metadata.labels ?? {},
    ownerReferences: (pod.metadata.ownerReferences ?? []).map((owner) => ({ kind: owner.kind, name: owner.name })),
    priorityClassName: pod.spec?.priorityClassName ?? undefined,
  })),
);

export const PdbListSchema = listOf(pdbSchema).transform((list): PdbRecord[] =>
  (list.items ?? []).map((pdb) => ({
    name: pdb.metadata.name,
    namespace: pdb.metadata.namespace,
    matchLabels: pdb.spec?.selector?.matchLabels ?? {},
    minAvailable: pdb.spec?.minAvailable ?? undefined,
    maxUnavailable: pdb.spec?.maxUnavailable ?? undefined,
  })),
);

export const PriorityClassListSchema = listOf(priorityClassSchema).transform((list): PriorityClassRecord[] =>
  (list.items ?? []).map((priorityClass) => ({
    name: priorityClass.metadata.name,
    value: priorityClass.value,
  })),
);
