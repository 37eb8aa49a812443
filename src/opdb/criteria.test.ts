/**
 * Selection criteria tests.
 *
 * Run: node --import tsx --test src/opdb/criteria.test.ts
 */

import { strict as assert } from "node:assert";
import { test } from "node:test";

import { criteriaToSql, toNaiveUtc } from "./criteria.js";

// ═══════════════════════════════════════════════════════════════════════════
// TIMESTAMPS
// ═══════════════════════════════════════════════════════════════════════════

test("dates are written in UTC without a zone designator", () => {
  assert.equal(toNaiveUtc(new Date("2024-01-02T12:04:05+09:00")), "2024-01-02T03:04:05.000");
});

test("an invalid date is rejected", () => {
  assert.throws(() => toNaiveUtc(new Date("not a date")), RangeError);
});

// ═══════════════════════════════════════════════════════════════════════════
// SQL CONDITIONS
// ═══════════════════════════════════════════════════════════════════════════

test("empty criteria select everything", () => {
  assert.deepEqual(criteriaToSql({}), { text: "TRUE", values: [] });
});

test("every criterion becomes one parameterized condition", () => {
  assert.deepEqual(
    criteriaToSql({
      dateStart: new Date("2024-01-02T03:04:05Z"),
      dateEnd: new Date("2024-02-01T00:00:00Z"),
      visitStart: 100,
      visitEnd: 200,
    }),
    {
      text:
        "(pfs_visit.issued_at >= $1 AND pfs_visit.issued_at < $2 " +
        "AND pfs_visit.pfs_visit_id >= $3 AND pfs_visit.pfs_visit_id < $4)",
      values: ["2024-01-02T03:04:05.000", "2024-02-01T00:00:00.000", 100, 200],
    }
  );
});

test("placeholders are numbered from the given parameter", () => {
  assert.deepEqual(criteriaToSql({ visitEnd: 50 }, 3), {
    text: "(pfs_visit.pfs_visit_id < $3)",
    values: [50],
  });
});

test("visit bounds must be integers", () => {
  assert.throws(() => criteriaToSql({ visitStart: 1.5 }), {
    name: "RangeError",
    message: "visitStart must be an integer (1.5)",
  });
});
