import path from "node:path";
import { createLogger, discoverSkills, type ResolvedConfig } from "@skillforge/core";
import { createInitialState } from "../wizard/state.js";
import { runWizard } from "../wizard/terminal.js";

export const WIZARD_LOG_FILE = path.join(".skillforge", "wizard.log");

export async function wizardCommand(config: ResolvedConfig, version: string): Promise<void> {
  const log = createLogger("wizard");
  const catalog = await discoverSkills(config.skillsDir);
  log.info(
    `discovered ${catalog.manifests.length} skill(s), ${catalog.errors.length} error(s) in ${config.skillsDir}`
  );

  const initialState = createInitialState({
    version,
    catalog,
    defaultDeployFolder: config.defaultDeployFolder
  });
  await runWizard({ config, initialState, log });
}
