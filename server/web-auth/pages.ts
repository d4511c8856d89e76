/**
 * HTML pages for the browser side of the GitHub login
 *
 * Every interpolated value goes through escapeHtml: identities come from
 * GitHub and error text can echo query parameters.
 */

import type { Identity, SessionView } from '../oauth/types.js';
import { escapeHtml } from '../utils/html.js';
import { formatTimestamp } from '../utils/timestamp.js';

const BASE_STYLE = `
  body {
    font-family: system-ui, -apple-system, sans-serif;
    max-width: 700px;
    margin: 50px auto;
    padding: 20px;
    line-height: 1.6;
  }
  .success {
    background: #d4edda;
    border: 1px solid #c3e6cb;
    color: #155724;
    padding: 20px;
    border-radius: 8px;
    margin-bottom: 20px;
  }
  .user-card {
    background: #f6f8fa;
    border: 1px solid #d1d5da;
    border-radius: 8px;
    padding: 20px;
    display: flex;
    gap: 20px;
    margin-bottom: 20px;
  }
  .avatar { border-radius: 50%; width: 80px; height: 80px; }
  .info-table { width: 100%; border-collapse: collapse; }
  .info-table td { padding: 8px; border-bottom: 1px solid #e1e4e8; }
  .info-table td:first-child { font-weight: bold; width: 150px; }
  .btn {
    display: inline-block;
    background: #0366d6;
    color: white;
    padding: 10px 20px;
    text-decoration: none;
    border-radius: 6px;
    margin-right: 10px;
  }
  .btn-secondary { background: #6c757d; }
  .btn-danger { background: #dc3545; }
`;

function layout(title: string, body: string): string {
  return `<!DOCTYPE html>
<html>
  <head>
    <title>${escapeHtml(title)}</title>
    <style>${BASE_STYLE}</style>
  </head>
  <body>
${body}
  </body>
</html>`;
}

function row(label: string, value: string | undefined): string {
  return value ? `<tr><td>${escapeHtml(label)}:</td><td>${escapeHtml(value)}</td></tr>` : '';
}

function userCard(identity: Identity): string {
  const avatar = identity.avatarUrl
    ? `<img src="${escapeHtml(identity.avatarUrl)}" alt="Avatar" class="avatar">`
    : '';
  return `
    <div class="user-card">
      ${avatar}
      <div style="flex: 1;">
        <h2>@${escapeHtml(identity.login)}</h2>
        <table class="info-table">
          <tr><td>Name:</td><td>${escapeHtml(identity.name ?? 'N/A')}</td></tr>
          <tr><td>Email:</td><td>${escapeHtml(identity.email ?? 'N/A')}</td></tr>
          ${row('Bio', identity.bio)}
          ${row('Location', identity.location)}
          ${row('Company', identity.company)}
          <tr><td>GitHub Profile:</td><td><a href="https://github.com/${encodeURIComponent(identity.login)}" target="_blank">View Profile</a></td></tr>
          ${row('Member Since', identity.createdAt)}
        </table>
      </div>
    </div>`;
}

/**
 * Shorten a session id for display: first 16 and last 8 characters
 */
export function truncateSessionId(id: string): string {
  if (id.length <= 24) {
    return id;
  }
  return `${id.slice(0, 16)}...${id.slice(-8)}`;
}

export function renderErrorPage(heading: string, details: Array<[string, string]>): string {
  const lines = details
    .map(([label, text]) => (label ? `<p><strong>${escapeHtml(label)}:</strong> ${escapeHtml(text)}</p>` : `<p>${escapeHtml(text)}</p>`))
    .join('\n    ');
  return layout(heading, `
    <h1>❌ ${escapeHtml(heading)}</h1>
    ${lines}
    <a href="/auth/login" class="btn">Try Again</a>`);
}

export function renderLoginSuccessPage(session: SessionView): string {
  return layout('Authentication Successful', `
    <div class="success">
      <h1>✅ Authentication Successful!</h1>
      <p>You have successfully authenticated with GitHub.</p>
    </div>
    ${userCard(session.identity)}
    <p><strong>📋 Session ID:</strong> <code>${escapeHtml(truncateSessionId(session.id))}</code></p>
    <a href="/auth/status" class="btn">View Full Status</a>
    <a href="/" class="btn btn-secondary">Go to Home</a>
    <p style="margin-top: 30px; color: #666; font-size: 14px;">
      You can now close this window and use the MCP server with authentication.
    </p>`);
}

export function renderNotAuthenticatedPage(): string {
  return layout('Authentication Status', `
    <h1>🔓 Not Authenticated</h1>
    <p>You are not currently authenticated.</p>
    <a href="/auth/login" class="btn">Login with GitHub</a>`);
}

export function renderStatusPage(session: SessionView): string {
  return layout('Authentication Status', `
    <div class="success">
      <h1>✅ Authenticated with GitHub</h1>
    </div>
    ${userCard(session.identity)}
    <h3>Session Information</h3>
    <table class="info-table">
      <tr><td>Token Type:</td><td>${escapeHtml(session.tokenType)}</td></tr>
      <tr><td>Scope:</td><td>${escapeHtml(session.scope)}</td></tr>
      <tr><td>Authenticated At:</td><td>${escapeHtml(formatTimestamp(session.createdAt))}</td></tr>
    </table>
    <div style="margin-top: 30px;">
      <a href="/auth/logout" class="btn btn-danger">Logout</a>
      <a href="/" class="btn btn-secondary">Go to Home</a>
    </div>`);
}

export function renderLoggedOutPage(login: string | undefined): string {
  const message = login
    ? `<p>You have been logged out from @${escapeHtml(login)}</p>`
    : '<p>No user was logged in.</p>';
  return layout('Logged Out', `
    <div class="success">
      <h1>✅ Successfully Logged Out</h1>
      ${message}
    </div>
    <a href="/auth/login" class="btn">Login Again</a>
    <a href="/" class="btn btn-secondary">Go to Home</a>`);
}
