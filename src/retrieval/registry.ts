import { ValidationError } from "../errors.js";
import type { RetrievalTool } from "./types.js";

/**
 * Tool identifier → implementation. Built once at startup and handed to the
 * fusion engine by reference; runs only read from it.
 */
export class ToolRegistry {
  private tools = new Map<string, RetrievalTool>();

  add(tool: RetrievalTool): void {
    if (this.tools.has(tool.name)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Retrieval tool "${tool.name}" already registered`);
    }
    this.tools.set(tool.name, tool);
  }

  remove(name: string): boolean {
    return this.tools.delete(name);
  }

  get(name: string): RetrievalTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): RetrievalTool[] {
    return [...this.tools.values()];
  }

  names(): string[] {
    return [...this.tools.keys()];
  }
}
