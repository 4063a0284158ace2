import type { PromptConfig } from "../types";

export const MENU_EXTRACTION_INSTRUCTION =
  "Extract menu items from this image and format them according to the specified JSON structure. Ensure prices are numbers, not strings.";

export const DEFAULT_PROMPT_CONFIG: PromptConfig = {
  menuSystem: [
    "You are a menu analysis expert. Extract every menu item visible in the image.",
    "For each menu item, provide:",
    "- name: the name of the dish exactly as printed",
    "- prices: array of numeric prices, one per size or portion option",
    '- price_labels: array of labels matching prices one-to-one (e.g. "Half", "Full"); use "" when the menu prints a single unlabeled price',
    "- description: the printed description, or a short plain description when none is printed",
    '- dietary_label: one of "veg", "non-veg", "spicy" or "unknown"',
    "Do not invent items, prices or labels that are not on the page.",
    "Respond with strict JSON only:",
    '{"items":[{"name":"string","prices":[0],"price_labels":["string"],"description":"string","dietary_label":"veg"}]}',
  ].join("\n"),
};

function sectionContent(markdown: string, section: string): string | null {
  const headingRegex = new RegExp(`^##\\s+${section}\\s*$`, "im");
  const headingMatch = headingRegex.exec(markdown);
  if (!headingMatch || headingMatch.index < 0) {
    return null;
  }

  const start = headingMatch.index + headingMatch[0].length;
  const remainder = markdown.slice(start);
  const nextHeading = /^\s*##\s+/m.exec(remainder);
  const rawSection = nextHeading
    ? remainder.slice(0, nextHeading.index)
    : remainder;

  const fenced = /```(?:text|md|markdown)?\s*([\s\S]*?)```/i.exec(rawSection);
  const content = fenced?.[1] ?? rawSection;
  const normalized = content.trim();
  return normalized || null;
}

export function parsePromptConfigMarkdown(markdown: string): PromptConfig {
  const menuSystem = sectionContent(markdown, "menu_extraction_system");

  if (!menuSystem) {
    throw new Error(
      "Prompt markdown is invalid. Required section: ## menu_extraction_system.",
    );
  }

  return { menuSystem };
}

export function promptConfigToMarkdown(config: PromptConfig): string {
  return [
    "# Menu Extractor Prompt Configuration",
    "",
    "Edit the section below. Keep the section header unchanged.",
    "",
    "## menu_extraction_system",
    "```text",
    config.menuSystem.trim(),
    "```",
    "",
  ].join("\n");
}
