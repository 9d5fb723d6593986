export {
  RC_START,
  RC_END,
  BACKUP_SUFFIX,
  buildRcBlock,
  findRcBlock,
  hasRcBlock,
  upsertRcBlock,
  removeRcBlock,
  type UpsertOutcome,
  type RemoveOutcome,
} from "./block.js";
export { bashRcPath, zshRcPath, rcPath, rcPayload, isRcShell, type RcShell } from "./paths.js";
