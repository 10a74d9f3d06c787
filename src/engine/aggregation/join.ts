/**
 * Composite-key hash join between priced cells and population weights.
 * Always keyed on country, gender, age, policyType; group and smokingStatus join
 * only when both tables carry the column. sumInsured never joins.
 */

import { COVERAGE_UNIT, DEFAULT_COVERAGE_UNITS } from "@/config/forecastDefaults";
import type { PolicyGroup, PolicyType, SmokingStatus } from "@/domain/premium/premium.schema";
import { hasColumn, type Table } from "@/domain/table/table";
import { compositeKey, indexBy } from "@/engine/keys";

export type JoinKeySet = {
  group: boolean;
  smokingStatus: boolean;
};

type JoinableRow = {
  country: string;
  gender: string;
  age: number;
  policyType: PolicyType;
  group?: PolicyGroup;
  smokingStatus?: SmokingStatus;
};

export type JoinedCell<L, R> = {
  left: L;
  right: R;
};

export function resolveJoinKeys<L, R>(left: Table<L>, right: Table<R>): JoinKeySet {
  return {
    group: hasColumn(left, "group") && hasColumn(right, "group"),
    smokingStatus: hasColumn(left, "smokingStatus") && hasColumn(right, "smokingStatus"),
  };
}

export function cellJoinKey(row: JoinableRow, keys: JoinKeySet): string {
  return compositeKey([
    row.country,
    row.gender,
    row.age,
    row.policyType,
    keys.group ? row.group : undefined,
    keys.smokingStatus ? row.smokingStatus : undefined,
  ]);
}

/** Inner join; output follows right-table order, then left order within a key. */
export function innerJoinCells<L extends JoinableRow, R extends JoinableRow>(
  left: ReadonlyArray<L>,
  right: ReadonlyArray<R>,
  keys: JoinKeySet
): JoinedCell<L, R>[] {
  const leftByKey = indexBy(left, (r) => cellJoinKey(r, keys));
  const joined: JoinedCell<L, R>[] = [];
  for (const r of right) {
    const matches = leftByKey.get(cellJoinKey(r, keys));
    if (!matches) continue;
    for (const l of matches) joined.push({ left: l, right: r });
  }
  return joined;
}

/**
 * Annual premium for a policy: premiumPerUnit × (sumInsured / 100,000),
 * or × 10 when no sum insured is known.
 */
export function actualPremium(premiumPerUnit: number, sumInsured: number | undefined): number {
  if (sumInsured === undefined) return premiumPerUnit * DEFAULT_COVERAGE_UNITS;
  return premiumPerUnit * (sumInsured / COVERAGE_UNIT);
}
