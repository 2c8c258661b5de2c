import path from "node:path";

import { type NamingOptions, isVideoFile } from "@/config/NamingOptions";
import type { FileSystemEntry } from "@/types";

import { FileStack, type StackResolver } from "./StackResolver";

type PotentialStack = {
  isDirectory: boolean;
  isNumerical: boolean;
  partType: string;
  parts: Map<string, FileSystemEntry>;
};

/**
 * 例如：
 *   Movie-cd1.mkv, Movie-cd2.mkv → Movie (2 片)
 *   Movie (disc1)/, Movie (disc2)/ → 資料夾堆疊
 * 同一堆疊內的片段類型（cd/part/disc）與檔案／資料夾類型必須一致，片號不可重複。
 */
export class StackResolverDefault implements StackResolver {
  private readonly namingOptions: NamingOptions;

  constructor(deps: { namingOptions: NamingOptions }) {
    this.namingOptions = deps.namingOptions;
  }

  resolve(entries: readonly FileSystemEntry[]): FileStack[] {
    const candidates = entries
      .filter((e) => e.isDirectory || isVideoFile(e.fullPath, this.namingOptions))
      .sort((a, b) =>
        a.fullPath < b.fullPath ? -1 : a.fullPath > b.fullPath ? 1 : 0
      );

    const stacks = new Map<string, PotentialStack>();
    for (const entry of candidates) {
      const name = path.basename(entry.fullPath);

      for (const rule of this.namingOptions.stackingRules) {
        const groups = rule.pattern.exec(name)?.groups;
        if (!groups) continue;

        const stackName = groups.filename ?? "";
        const partNumber = groups.number ?? "";
        const partType = groups.parttype ?? "unknown";

        let stack = stacks.get(stackName);
        if (!stack) {
          stack = {
            isDirectory: entry.isDirectory,
            isNumerical: rule.isNumerical,
            partType,
            parts: new Map(),
          };
          stacks.set(stackName, stack);
        }

        if (stack.parts.size > 0) {
          if (
            stack.isDirectory !== entry.isDirectory ||
            stack.partType.toLowerCase() !== partType.toLowerCase() ||
            stack.parts.has(partNumber)
          ) {
            continue;
          }
          // 數字片號與字母片號不混用
          if (rule.isNumerical !== stack.isNumerical) break;
        }

        stack.parts.set(partNumber, entry);
        break;
      }
    }

    const result: FileStack[] = [];
    for (const [stackName, stack] of stacks) {
      if (stack.parts.size < 2) continue;
      result.push(
        new FileStack(
          stackName,
          stack.isDirectory,
          Array.from(stack.parts.values(), (p) => p.fullPath)
        )
      );
    }
    return result;
  }
}
