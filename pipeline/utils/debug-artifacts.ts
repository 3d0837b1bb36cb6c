import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { errorMessage, sanitizeFilenamePart } from "../../shared/text-utils.js";
import type { CheckUnit } from "../../shared/contracts.js";
import { silentLogger, type MonitorLogger } from "./logger.js";

export interface DebugArtifactPage {
  unit: CheckUnit;
  /** 1-based position of the URL within the unit's candidate list. */
  attempt: number;
  sourceUrl: string;
  html: string;
  pageText: string;
}

interface DebugArtifactWriterOptions {
  directory: string;
  logger?: MonitorLogger;
  now?: () => Date;
}

export class DebugArtifactWriter {
  private readonly directory: string;

  private readonly logger: MonitorLogger;

  private readonly now: () => Date;

  constructor(options: DebugArtifactWriterOptions) {
    this.directory = options.directory;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  buildBaseFilename(page: Pick<DebugArtifactPage, "unit" | "attempt">, generatedAt: Date): string {
    const timestamp = generatedAt.toISOString().replace(/[:.]/g, "-");
    return [
      "debug",
      sanitizeFilenamePart(page.unit.park.id),
      page.unit.date.key,
      page.unit.date.compactDate,
      String(page.attempt),
      timestamp
    ].join("_");
  }

  /**
   * Writes the raw HTML and its extracted text side by side. Failures are
   * logged and swallowed; returns the written paths or null.
   */
  async write(page: DebugArtifactPage): Promise<{ htmlPath: string; textPath: string } | null> {
    const generatedAt = this.now();
    const baseFilename = this.buildBaseFilename(page, generatedAt);
    const htmlPath = join(this.directory, `${baseFilename}.html`);
    const textPath = join(this.directory, `${baseFilename}.txt`);
    const { unit, sourceUrl } = page;
    const targetDate = `${unit.date.isoDate} ${unit.date.dayName}`;

    try {
      await mkdir(this.directory, { recursive: true });

      const htmlHeader = [
        `<!-- Park: ${unit.park.name} -->`,
        `<!-- Day Label: ${unit.date.label} -->`,
        `<!-- Target Date: ${targetDate} -->`,
        `<!-- Source URL: ${sourceUrl} -->`,
        `<!-- Generated: ${generatedAt.toISOString()} -->`
      ].join("\n");
      await writeFile(htmlPath, `${htmlHeader}\n\n${page.html}`, "utf8");

      const textHeader = [
        `Park: ${unit.park.name}`,
        `Day Label: ${unit.date.label}`,
        `Target Date: ${targetDate}`,
        `Source URL: ${sourceUrl}`,
        `Generated: ${generatedAt.toISOString()}`,
        "=".repeat(80)
      ].join("\n");
      await writeFile(textPath, `${textHeader}\n\n${page.pageText}`, "utf8");

      this.logger.debug(`[debug-artifact] Saved ${htmlPath}, ${textPath}`);
      return { htmlPath, textPath };
    } catch (artifactError) {
      this.logger.warn(
        `[debug-artifact] Failed to save debug artifacts: ${errorMessage(artifactError)}`
      );
      return null;
    }
  }
}
