/**
 * Schedule Module
 * Expands the configuration into the build matrix
 */

import type { BuildConfig } from "../types/config";
import type { BuildContext, BuildTask } from "../types";

/**
 * languages × flavors × enabled formats, language-major, then flavor,
 * then format in declaration order
 */
export function createBuildMatrix(config: BuildConfig): BuildTask[] {
  const formats = Object.entries(config.formats).filter(([, spec]) => spec.enabled);
  const tasks: BuildTask[] = [];

  for (const language of config.languages) {
    for (const flavor of config.flavors) {
      for (const [format, spec] of formats) {
        tasks.push(
          Object.freeze({
            id: `${language}/${flavor}/${format}`,
            index: tasks.length,
            language,
            flavor,
            format,
            options: spec.options,
          }),
        );
      }
    }
  }

  return tasks;
}

export function schedule(ctx: BuildContext): void {
  const tasks = createBuildMatrix(ctx.config);
  ctx.tasks = tasks;
  ctx.tracker.setTotalTasks(tasks.length);

  ctx.logger.info(
    `Scheduled ${tasks.length} task(s): ${ctx.config.languages.length} language(s) × ${ctx.config.flavors.length} flavor(s)`,
  );
}
