import type { UploadResult } from "./types";

export function formatUploadSummary(results: readonly UploadResult[]): string {
  if (!results.length) return "No upload results.";

  const succeeded = results.filter((result) => result.success);
  const failed = results.filter((result) => !result.success);
  const lines = [
    `Upload summary: ${results.length} service(s), ${succeeded.length} succeeded, ${failed.length} failed`
  ];

  if (succeeded.length) {
    lines.push("Succeeded:");
    for (const result of succeeded) {
      const url = result.response_url ? ` ${result.response_url}` : "";
      lines.push(`  - ${result.display_name}: ${result.message}${url}`);
    }
  }
  if (failed.length) {
    lines.push("Failed:");
    for (const result of failed) {
      lines.push(`  - ${result.display_name}: ${result.message}`);
    }
  }
  return lines.join("\n");
}
