import type { ZodError } from "zod";

export type ContractIssue = { path: string; message: string };

export function formatIssues(err: ZodError): ContractIssue[] {
  return err.issues.map((i) => ({ path: i.path.join("."), message: i.message }));
}

export function summarizeIssues(err: ZodError): string {
  return formatIssues(err)
    .map((i) => (i.path ? `${i.path}: ${i.message}` : i.message))
    .join("; ");
}
