import { UnparseableInputError } from "@sitedocs/errors";
import type { ProjectTask } from "@sitedocs/types";
import type { IEntityExtractor } from "./extractor.interface.js";
import { DATE_SOURCE, parseDate, splitLines } from "./parse-utils.js";

const HEADER_PATTERNS = [/\b(?:task|activity)\b/i, /\b(?:duration|start|finish)\b/i];

const PHASE_PATTERN = /^(?:phase|stage)\s+\w+\s*[:\-–]\s*\S.*$/i;

const WITH_DURATION = new RegExp(
  String.raw`^(?:(?<ref>\d+(?:\.\d+)*)\s+)?(?<name>.*?[A-Za-z].*?)\s+(?<duration>\d+(?:\.\d+)?)\s*(?<unit>days?|d|weeks?|wks?|w|months?|mons?)\b(?:\s+(?<start>${DATE_SOURCE}))?(?:\s+(?<finish>${DATE_SOURCE}))?$`,
  "i",
);

const DATES_ONLY = new RegExp(
  String.raw`^(?:(?<ref>\d+(?:\.\d+)*)\s+)?(?<name>.*?[A-Za-z].*?)\s+(?<start>${DATE_SOURCE})\s+(?<finish>${DATE_SOURCE})$`,
);

function toDays(value: string, unit: string): number {
  const amount = Number(value);
  const u = unit.toLowerCase();
  if (u.startsWith("w")) return Math.round(amount * 7);
  if (u.startsWith("m")) return Math.round(amount * 30);
  return Math.round(amount);
}

/**
 * Programme rows: a task name followed by a duration (days, weeks or
 * months) and optional start/finish dates, or by the two dates alone.
 * "Phase N: ..." / "Stage N: ..." lines set the phase of following tasks.
 */
export class TaskListExtractor implements IEntityExtractor<ProjectTask> {
  readonly pdfType = "task_list" as const;

  extract(text: string): ProjectTask[] {
    const lines = splitLines(text);
    const headerIndex = lines.findIndex((line) => HEADER_PATTERNS.every((p) => p.test(line)));
    if (headerIndex === -1) {
      throw new UnparseableInputError("Task table header not found", {
        code: "TASK_TABLE_HEADER_MISSING",
      });
    }

    const tasks: ProjectTask[] = [];
    let phase: string | null = null;

    for (const line of lines.slice(headerIndex + 1)) {
      if (PHASE_PATTERN.test(line)) {
        phase = line;
        continue;
      }

      const timed = WITH_DURATION.exec(line)?.groups;
      const dated = timed ? undefined : DATES_ONLY.exec(line)?.groups;
      const groups = timed ?? dated;
      if (!groups) continue;

      const duration = groups["duration"];
      const unit = groups["unit"];

      tasks.push({
        kind: "project_task",
        sequence: tasks.length,
        taskRef: groups["ref"] ?? null,
        name: groups["name"] ?? "",
        phase,
        durationDays: duration !== undefined && unit !== undefined ? toDays(duration, unit) : null,
        startDate: parseDate(groups["start"]),
        finishDate: parseDate(groups["finish"]),
      });
    }

    return tasks;
  }
}
