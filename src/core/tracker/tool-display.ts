import { readFileSync } from "node:fs";
import { z } from "zod";

const ToolDisplaySchema = z.object({
  defaultIcon: z.string(),
  tools: z.record(z.object({ icon: z.string(), verb: z.string() })),
  collapsible: z.array(z.string()),
});

export type ToolDisplayTable = z.infer<typeof ToolDisplaySchema>;

let table: ToolDisplayTable | undefined;

/**
 * Icon/verb table for tool names, read once from tool-display.json
 */
export function getToolDisplayTable(): ToolDisplayTable {
  if (!table) {
    const raw = readFileSync(new URL("./tool-display.json", import.meta.url), "utf-8");
    table = ToolDisplaySchema.parse(JSON.parse(raw));
  }
  return table;
}

export function getToolIcon(toolName: string): string {
  const display = getToolDisplayTable();
  return display.tools[toolName]?.icon ?? display.defaultIcon;
}

export function getToolVerb(toolName: string): string {
  return getToolDisplayTable().tools[toolName]?.verb ?? toolName;
}

export function isCollapsibleTool(toolName: string): boolean {
  return getToolDisplayTable().collapsible.includes(toolName);
}
