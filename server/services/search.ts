import type { Employee } from "@shared/schema";
import { describeError, log } from "../logger";

export interface EmployeeDocument {
  id: string;
  name: string;
  email: string;
  position: string | null;
  departmentName: string | null;
}

export interface SearchHit {
  id: string;
  /** Number of query tokens the document matched */
  score: number;
  document: EmployeeDocument;
}

export interface SearchIndex {
  upsertEmployeeDocument(document: EmployeeDocument): Promise<void>;
  removeEmployeeDocument(employeeId: string): Promise<void>;
  query(text: string, limit: number): Promise<SearchHit[]>;
}

export function toEmployeeDocument(employee: Employee, departmentName: string | null): EmployeeDocument {
  return {
    id: employee.id,
    name: employee.name,
    email: employee.email,
    position: employee.position,
    departmentName,
  };
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 0);
}

/**
 * Token index over name, email, position and department. A query token
 * matches a document token when it is a prefix of it; hits are ranked by
 * matched-token count, then name, then id.
 */
export class InMemorySearchIndex implements SearchIndex {
  private readonly documents = new Map<string, { document: EmployeeDocument; tokens: Set<string> }>();

  async upsertEmployeeDocument(document: EmployeeDocument): Promise<void> {
    const tokens = new Set(
      [document.name, document.email, document.position ?? "", document.departmentName ?? ""].flatMap(tokenize),
    );
    this.documents.set(document.id, { document: { ...document }, tokens });
  }

  async removeEmployeeDocument(employeeId: string): Promise<void> {
    this.documents.delete(employeeId);
  }

  async query(text: string, limit: number): Promise<SearchHit[]> {
    const queryTokens = Array.from(new Set(tokenize(text)));
    if (queryTokens.length === 0) return [];

    const hits: SearchHit[] = [];
    for (const { document, tokens } of Array.from(this.documents.values())) {
      const indexed = Array.from(tokens);
      const score = queryTokens.filter((q) => indexed.some((t) => t.startsWith(q))).length;
      if (score > 0) hits.push({ id: document.id, score, document: { ...document } });
    }

    return hits
      .sort(
        (a, b) =>
          b.score - a.score ||
          a.document.name.localeCompare(b.document.name) ||
          (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
      )
      .slice(0, Math.max(limit, 0));
  }
}

/** Index writes never fail the employee write that triggered them. */
export function syncInBackground(operation: Promise<void>, description: string): void {
  void operation.catch((error: unknown) => {
    log.warn(`search index ${description} failed: ${describeError(error)}`, "search");
  });
}
