import { describe, it, expect } from "vitest";
import { classify, scoreDocument } from "./classifier.js";

const COST_SCHEDULE = `BILL OF QUANTITIES
Item Description Qty Unit Rate Amount
1 Excavation 120 m3 450.00 54,000.00`;

const TASK_LIST = `PROJECT PROGRAMME
Task Duration Start Finish
Site clearance 5 days 2024-03-01 2024-03-05
Foundations 3 weeks 2024-03-06 2024-03-26`;

const APPROVAL = `Building Plan Approval Process
Step 1: Submit application form to the municipal council
Step 2: Pay the assessment fee
Step 3: Site inspection by the authority`;

const CIRCULAR = `CIRCULAR TO PROFESSIONAL INSTITUTES
1.1 With effect from 1 January 2024, balconies shall be computed as gross floor area.
1.2 The maximum balcony depth is 1.5 m.`;

describe("scoreDocument", () => {
  it("classifies a bill of quantities as cost_schedule", () => {
    const result = scoreDocument(COST_SCHEDULE);

    expect(result.pdfType).toBe("cost_schedule");
    expect(result.scores.cost_schedule).toBe(8);
    expect(result.matched.cost_schedule).toEqual([
      "bill of quantities",
      "unit rate",
      "quantity column",
      "amount",
      "material unit",
    ]);
    expect(result.reason).toBe(
      "costing override: bill of quantities, unit rate, quantity column, amount, material unit",
    );
  });

  it("classifies a programme as task_list", () => {
    const result = scoreDocument(TASK_LIST);

    expect(result.pdfType).toBe("task_list");
    expect(result.scores).toEqual({
      cost_schedule: 0,
      task_list: 6,
      approval_process: 0,
      ura_circular: 0,
    });
    expect(result.reason).toBe(
      "highest score 6: duration, start or finish, elapsed time, activity, date",
    );
  });

  it("classifies numbered approval steps as approval_process", () => {
    const result = scoreDocument(APPROVAL);

    expect(result.pdfType).toBe("approval_process");
    expect(result.scores.approval_process).toBe(6);
  });

  it("classifies a circular with numbered clauses as ura_circular", () => {
    const result = scoreDocument(CIRCULAR);

    expect(result.pdfType).toBe("ura_circular");
    expect(result.scores.ura_circular).toBe(6);
    expect(result.matched.ura_circular).toEqual([
      "circular",
      "numbered clauses",
      "statutory wording",
      "regulation",
    ]);
  });

  it("lets costing signals override a stronger schedule", () => {
    const result = scoreDocument(`${TASK_LIST}\nTotal cost estimate: $ 45,000`);

    expect(result.scores.task_list).toBe(6);
    expect(result.scores.cost_schedule).toBe(3);
    expect(result.pdfType).toBe("cost_schedule");
  });

  it("breaks ties in favour of approval_process over ura_circular", () => {
    const result = scoreDocument("Approval circular\nSubmission under the regulations");

    expect(result.scores.approval_process).toBe(3);
    expect(result.scores.ura_circular).toBe(3);
    expect(result.pdfType).toBe("approval_process");
  });

  it("returns unknown below the confidence threshold", () => {
    const result = scoreDocument("Minutes of the weekly site meeting. Attendance was good.");

    expect(result.pdfType).toBe("unknown");
    expect(result.reason).toBe("no type reached the confidence threshold (3)");
  });

  it("does not count dates as table numbers", () => {
    const rows = ["A 2024-01-01 2024-01-02", "B 2024-01-03 2024-01-04", "C 2024-01-05 2024-01-06"];
    expect(scoreDocument(rows.join("\n")).matched.cost_schedule).toEqual([]);
  });

  it("detects numeric table rows", () => {
    const rows = ["A 1 2 3", "B 4 5 6", "C 7 8 9"];
    expect(scoreDocument(rows.join("\n")).matched.cost_schedule).toEqual(["numeric table rows"]);
  });
});

describe("classify", () => {
  it("is deterministic", () => {
    expect(classify(CIRCULAR)).toBe(classify(CIRCULAR));
  });

  it("returns unknown for empty text", () => {
    expect(classify("")).toBe("unknown");
  });
});
