/**
 * Host alias lookup in the ssh client configuration
 */

import { readFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { HostAliasResolver } from "../types";
import { isNotFoundError } from "../utils/errors";
import { logger } from "../utils/logger";

export function defaultSshConfigPath(): string {
  return path.join(os.homedir(), ".ssh", "config");
}

/**
 * Collect the aliases declared on `Host` lines. Patterns are returned
 * verbatim; wildcards are not expanded.
 */
export function parseSshHostAliases(content: string): string[] {
  const aliases: string[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;

    const match = line.match(/^host(?:\s*=\s*|\s+)(.+)$/i);
    if (!match?.[1]) continue;

    const value = match[1].replace(/\s+#.*$/, "");
    for (const alias of value.split(/\s+/)) {
      const unquoted = alias.replace(/^"(.*)"$/, "$1");
      if (unquoted) aliases.push(unquoted);
    }
  }

  return aliases;
}

export class SshConfigHostResolver implements HostAliasResolver {
  constructor(private readonly configPath: string = defaultSshConfigPath()) {}

  async hasProfile(host: string): Promise<boolean> {
    let content: string;
    try {
      content = await readFile(this.configPath, "utf8");
    } catch (error) {
      if (isNotFoundError(error)) {
        logger.debug(`ssh config not found: ${this.configPath}`);
        return false;
      }
      throw error;
    }

    const wanted = host.toLowerCase();
    return parseSshHostAliases(content).some((alias) => alias.toLowerCase() === wanted);
  }
}
