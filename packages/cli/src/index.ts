export { CtxsyncEntrypoint } from "./bin/CtxsyncEntrypoint.js";
export { SyncCommands, parseSyncArgs, formatContextLines, contextToJson } from "./commands/sync/SyncCommands.js";
export { SearchCommand, parseSearchArgs } from "./commands/search/SearchCommand.js";
export { EmbedCommand, parseEmbedArgs } from "./commands/embed/EmbedCommand.js";
