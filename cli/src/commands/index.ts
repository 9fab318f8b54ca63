export { handleSwapfile, type HandleOptions } from "./handle.js";
export { locateSession } from "./locate.js";
export { showProbe } from "./probe.js";
export { defaultIo, createCommandContext, type CommandIo, type CommonOptions } from "./command-helper.js";
