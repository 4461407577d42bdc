import { z } from 'zod/v4';
import { countInstanceTypes, makePrice, type MultiCluster, roundMoney } from './values.js';

const BlueprintNodeSchema = z.object({
  instance_type: z.string().min(1),
});

const SingleBlueprintSchema = z.object({
  cluster_uid: z.string().min(1),
  blueprint: z.object({
    usd_per_month: z.object({
      cluster: z.number().nonnegative(),
      storage: z.number().nonnegative(),
    }),
    nodes: z.array(BlueprintNodeSchema),
  }),
});

/** Shape shared by a current blueprint and an optimal plan. Unknown keys are ignored. */
export const BlueprintDocumentSchema = z.object({
  blueprints: z.array(SingleBlueprintSchema),
});

export type BlueprintDocument = z.infer<typeof BlueprintDocumentSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.length ? i.path.join('.') : '<root>'}: ${i.message}`)
    .join('; ');
}

/**
 * Converts a blueprint or optimal-plan document into per-physical-cluster records.
 * Prices are rounded to cents here, where they enter the system.
 */
export function toMultiCluster(mcUid: string, doc: unknown): MultiCluster {
  const parsed = BlueprintDocumentSchema.safeParse(doc);
  if (!parsed.success) {
    throw new Error(`Malformed blueprint document for ${mcUid}: ${describeIssues(parsed.error)}`);
  }

  return {
    uid: mcUid,
    clusters: parsed.data.blueprints.map((single) => {
      const { usd_per_month: cost, nodes } = single.blueprint;
      return {
        uid: single.cluster_uid,
        infra: countInstanceTypes(nodes.map((n) => n.instance_type)),
        price: makePrice(roundMoney(cost.cluster), roundMoney(cost.storage)),
      };
    }),
  };
}
