export type OutputFormat = "terminal" | "plain";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["terminal", "plain"];

export function resolveOutputFormat(
  variables: Record<string, string | undefined>
): OutputFormat {
  const raw = variables.OUTPUT_FORMAT?.trim().toLowerCase();
  return OUTPUT_FORMATS.find((format) => format === raw) ?? "terminal";
}
