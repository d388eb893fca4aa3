import { runMcpServer } from '../../mcp/index.js';
import { reportFailure } from '../session.js';

export async function serveCommand(): Promise<void> {
  try {
    await runMcpServer();
  } catch (err) {
    reportFailure(err);
  }
}
