import type { McpDeps, McpServer } from '../../mcp-core/mcp-types.js';
import { textResult } from '../../mcp-core/tool-results.js';
import type { SessionDebugInfo } from '../../oauth/auth-flow.js';
import { formatTimestamp } from '../../utils/timestamp.js';

export function formatSessionDebugInfo(info: SessionDebugInfo): string {
  const lines = ['🔍 **GitHub Auth Debug Information**', '', `**Total Active Sessions:** ${info.total}`, ''];

  if (info.total === 0) {
    lines.push('No active sessions found.', "Use 'github_login' to authenticate.");
    return lines.join('\n');
  }

  lines.push('**All Sessions:**');
  info.sessions.forEach((session, index) => {
    const marker = session.id === info.currentId ? ' (current)' : '';
    lines.push(
      '',
      `${index + 1}. Session ID: \`${session.id.slice(0, 16)}...\`${marker}`,
      `   - User: @${session.identity.login}`,
      `   - Name: ${session.identity.name ?? 'N/A'}`,
      `   - Created: ${formatTimestamp(session.createdAt)}`,
    );
  });

  lines.push('', '**Current Session:**');
  const current = info.sessions.find((session) => session.id === info.currentId);
  if (current) {
    lines.push(`✅ Active session for @${current.identity.login}`, `   Created: ${formatTimestamp(current.createdAt)}`);
  } else {
    lines.push('❌ No current session active');
  }
  return lines.join('\n');
}

export function registerGitHubDebugSessionsTool(mcp: McpServer, { authFlow }: McpDeps): void {
  mcp.registerTool(
    'github_debug_sessions',
    {
      title: 'GitHub Debug Sessions',
      description: 'List the sessions held by this server and which one is current. Access tokens are not shown.',
    },
    async () => textResult(formatSessionDebugInfo(authFlow.debugSessions())),
  );
}
