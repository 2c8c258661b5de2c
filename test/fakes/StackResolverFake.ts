import type { FileStack, StackResolver } from "@/services/StackResolver";
import type { FileSystemEntry } from "@/types";

export class StackResolverFake implements StackResolver {
  readonly calls: FileSystemEntry[][] = [];
  private stacks: FileStack[] = [];

  resolve(entries: readonly FileSystemEntry[]): FileStack[] {
    this.calls.push([...entries]);
    return this.stacks;
  }

  setStacks(stacks: FileStack[]) {
    this.stacks = stacks;
  }
}
