/**
 * Selection criteria of observation database queries.
 */

export interface SelectionCriteria {
  /** Only visits issued at or after this time */
  dateStart?: Date;
  /** Only visits issued before this time */
  dateEnd?: Date;
  /** Only visits numbered at least this */
  visitStart?: number;
  /** Only visits numbered below this */
  visitEnd?: number;
}

/**
 * A parameterized SQL expression. Placeholders are numbered `$n` as the
 * `pg` client expects.
 */
export interface SqlExpression {
  text: string;
  values: (string | number)[];
}

/**
 * Timestamp in UTC without a zone designator, the way `issued_at` is stored.
 */
export function toNaiveUtc(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new RangeError("Invalid date in selection criteria");
  }
  return date.toISOString().replace(/Z$/, "");
}

function checkVisit(name: string, visit: number): number {
  if (!Number.isSafeInteger(visit)) {
    throw new RangeError(`${name} must be an integer (${visit})`);
  }
  return visit;
}

/**
 * SQL condition for `criteria`, with placeholders numbered from
 * `firstParam`. Empty criteria give `TRUE`.
 */
export function criteriaToSql(criteria: SelectionCriteria, firstParam = 1): SqlExpression {
  const expressions: string[] = [];
  const values: (string | number)[] = [];
  const add = (condition: string, value: string | number): void => {
    values.push(value);
    expressions.push(`${condition} $${firstParam + values.length - 1}`);
  };

  if (criteria.dateStart !== undefined) {
    add("pfs_visit.issued_at >=", toNaiveUtc(criteria.dateStart));
  }
  if (criteria.dateEnd !== undefined) {
    add("pfs_visit.issued_at <", toNaiveUtc(criteria.dateEnd));
  }
  if (criteria.visitStart !== undefined) {
    add("pfs_visit.pfs_visit_id >=", checkVisit("visitStart", criteria.visitStart));
  }
  if (criteria.visitEnd !== undefined) {
    add("pfs_visit.pfs_visit_id <", checkVisit("visitEnd", criteria.visitEnd));
  }

  return expressions.length > 0
    ? { text: `(${expressions.join(" AND ")})`, values }
    : { text: "TRUE", values };
}
