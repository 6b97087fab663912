const RESET = "\u001b[0m";

export type ColorMode = "auto" | "always" | "never";

let colorMode: ColorMode = "auto";

function detectAutoColor(): boolean {
  if (process.env.NO_COLOR && ["1", "true"].includes(process.env.NO_COLOR.toLowerCase())) {
    return false;
  }
  if (process.env.FORCE_COLOR && process.env.FORCE_COLOR !== "0") {
    return true;
  }
  return Boolean(process.stdout?.isTTY);
}

function colorEnabled(): boolean {
  if (colorMode === "always") {
    return true;
  }
  if (colorMode === "never") {
    return false;
  }
  return detectAutoColor();
}

function apply(code: string, text: string): string {
  if (!colorEnabled()) {
    return text;
  }
  return `\u001b[${code}m${text}${RESET}`;
}

export function setColorMode(mode: ColorMode): void {
  colorMode = mode;
}

const colors = {
  dim: (text: string) => apply("2", text),
  red: (text: string) => apply("31", text),
  yellow: (text: string) => apply("33", text),
  cyan: (text: string) => apply("36", text),
};

export function formatId(id: string): string {
  return colors.cyan(id);
}

export function formatNote(text: string): string {
  return colors.dim(text);
}

export function formatWarning(text: string): string {
  return `${colors.yellow("warn")} ${text}`;
}

export function formatError(text: string): string {
  return `${colors.red("error")} ${text}`;
}
