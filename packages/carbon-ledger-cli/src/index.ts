export { buildProgram } from './cli';
export { CommandContext, printVerification, readPayloadFile, withLedger } from './context';
export { AppendOptions, AmendOptions, amendCommand, appendCommand } from './commands/append';
export { AnchorOptions, anchorCommand } from './commands/anchor';
export { AuditOptions, auditCommand } from './commands/audit';
export { APPEND_ONLY_TRIGGERS, doctorCommand } from './commands/doctor';
export {
  VerifyAnchorOptions,
  VerifyChainOptions,
  verifyAnchorCommand,
  verifyChainCommand,
  verifyRecordCommand
} from './commands/verify';
