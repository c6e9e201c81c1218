import type { Message, Session } from "../types/index.js";

function roleLabel(message: Message): string {
  return message.role === "user" ? "You" : "Assistant";
}

/**
 * Render a session as Markdown. Output depends only on the session and
 * `exportedAt`.
 */
export function renderSessionMarkdown(session: Session, exportedAt: Date): string {
  const lines: string[] = [
    `# ${session.name}`,
    "",
    `- **Session ID:** ${session.id}`,
    `- **Created:** ${session.createdAt}`,
    `- **Status:** ${session.status}`,
  ];
  if (session.endedAt) {
    lines.push(`- **Ended:** ${session.endedAt}`);
  }
  lines.push(`- **Messages:** ${session.messages.length}`);
  lines.push(`- **Exported:** ${exportedAt.toISOString()}`);
  lines.push("", "---", "");

  for (const message of session.messages) {
    lines.push(`### ${roleLabel(message)} (${message.timestamp})`, "", message.content, "");
    if (message.sources && message.sources.length > 0) {
      lines.push("**Sources:**", "");
      for (const source of message.sources) {
        lines.push(`- \`${source}\``);
      }
      lines.push("");
    }
  }

  return lines.join("\n");
}
