import {
  CalendarEvent,
  formatEventDate,
  formatEventDuration,
  formatEventTime,
} from "../events/event.js";

export function quoteBlock(text: string): string {
  return text
    .trim()
    .split(/\r?\n/)
    .map((line) => (line.trim() ? `> ${line}` : ">"))
    .join("\n");
}

/** Body of a freshly created event note; `agenda` is inserted under the Notes heading. */
export function eventNoteBody(event: CalendarEvent, agenda?: string): string {
  const lines: string[] = [
    "",
    `# ${event.title}`,
    "",
    "## Event Details",
    "",
    `- **Date**: ${formatEventDate(event)}`,
    `- **Time**: ${formatEventTime(event)}`,
    `- **Duration**: ${formatEventDuration(event)}`,
    `- **Calendar**: ${event.calendarName}`,
  ];
  if (event.location) {
    lines.push(`- **Location**: ${event.location}`);
  }

  lines.push("", "## Notes", "");
  if (event.description.trim()) {
    lines.push(quoteBlock(event.description), "");
  }
  if (agenda) {
    lines.push(agenda.trimEnd(), "");
  }

  lines.push("## Action Items", "", "- [ ] ", "", "## Summary", "");
  return lines.join("\n");
}

export function standaloneNoteBody(title: string): string {
  return ["", `# ${title}`, "", "## Notes", ""].join("\n");
}
