/**
 * Attribute filters applied identically to premium records and demographic rows.
 * A filter only touches a table that carries the filtered column.
 */

import type { ForecastFilters, Gender, PolicyGroup, PolicyType, SmokingStatus } from "@/domain/premium/premium.schema";
import { hasColumn, withRows, type Table } from "@/domain/table/table";

export type FilterableRow = {
  gender: Gender;
  age: number;
  policyType: PolicyType;
  group?: PolicyGroup;
  smokingStatus?: SmokingStatus;
};

/**
 * Applies gender, policyType, group, smokingStatus and age bounds.
 * sumInsured is not handled here: it is not a join key and is filtered after the join.
 */
export function applyFilters<R extends FilterableRow>(table: Table<R>, filters: ForecastFilters): Table<R> {
  const { gender, policyType, group, smokingStatus, ageMin, ageMax } = filters;
  const filterGroup = group != null && hasColumn(table, "group");
  const filterSmoking = smokingStatus != null && hasColumn(table, "smokingStatus");

  const rows = table.rows.filter((r) => {
    if (gender != null && r.gender !== gender) return false;
    if (policyType != null && r.policyType !== policyType) return false;
    if (filterGroup && r.group !== group) return false;
    if (filterSmoking && r.smokingStatus !== smokingStatus) return false;
    if (ageMin != null && r.age < ageMin) return false;
    if (ageMax != null && r.age > ageMax) return false;
    return true;
  });

  return withRows(table, rows);
}
