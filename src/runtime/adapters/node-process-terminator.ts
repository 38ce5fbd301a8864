import { exitStatus, type ExitCode, type ProcessTerminator } from '../ports/process-terminator.js';

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    process.exit(exitStatus(code));
  }
}
