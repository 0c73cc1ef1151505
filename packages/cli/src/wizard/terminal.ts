import readline from "node:readline";
import type { Logger, ResolvedConfig } from "@skillforge/core";
import { WizardController } from "./controller.js";
import { createTheme, renderWizard } from "./view.js";
import type { KeyPress } from "./keys.js";
import type { WizardState } from "./state.js";

const ALT_SCREEN_ON = "\x1b[?1049h";
const ALT_SCREEN_OFF = "\x1b[?1049l";
const CURSOR_HIDE = "\x1b[?25l";
const CURSOR_SHOW = "\x1b[?25h";
const CLEAR = "\x1b[H\x1b[2J";

export type RunWizardOptions = {
  config: ResolvedConfig;
  initialState: WizardState;
  log: Logger;
  input?: NodeJS.ReadStream;
  output?: NodeJS.WriteStream;
};

/**
 * Run the wizard on the terminal until the user quits.
 */
export function runWizard(options: RunWizardOptions): Promise<void> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  if (!input.isTTY) {
    return Promise.reject(new Error("The wizard needs an interactive terminal (stdin is not a TTY)"));
  }

  const theme = createTheme();
  const draw = (state: WizardState) => output.write(CLEAR + renderWizard(state, theme));

  return new Promise<void>((resolve) => {
    const onKeypress = (_str: string | undefined, key: KeyPress | undefined) => {
      if (key) controller.dispatch({ type: "key", key });
    };

    const restore = () => {
      input.off("keypress", onKeypress);
      input.setRawMode(false);
      input.pause();
      output.write(CURSOR_SHOW + ALT_SCREEN_OFF);
    };

    const controller = new WizardController({
      config: options.config,
      initialState: options.initialState,
      log: options.log,
      onChange: draw,
      onQuit: () => {
        restore();
        output.write("Goodbye!\n");
        resolve();
      }
    });

    readline.emitKeypressEvents(input);
    input.setRawMode(true);
    input.resume();
    input.on("keypress", onKeypress);

    output.write(ALT_SCREEN_ON + CURSOR_HIDE);
    draw(controller.state);
  });
}
