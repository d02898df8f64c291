/**
 * Renderers Module
 *
 * Builds the birthday message sent to each recipient. Every message has a
 * subject, a plain-text body and an HTML alternative.
 *
 * Usage from an orchestrator node:
 * const { renderBirthdayEmail } = await import('birthday-mailer-etl/renderers');
 * const { subject, textBody, htmlBody } = renderBirthdayEmail('John Doe', { senderName: 'HR Team' });
 */

export interface BirthdayEmail {
  subject: string;
  textBody: string;
  htmlBody: string;
}

export interface RenderOptions {
  /** Signature line. Omitted when absent. */
  senderName?: string | undefined;
}

const FALLBACK_NAME = 'Friend';

/**
 * Render the birthday greeting for one recipient. An absent or blank name
 * is greeted as "Friend".
 */
export function renderBirthdayEmail(name: string | null, options: RenderOptions = {}): BirthdayEmail {
  const displayName = name?.trim() || FALLBACK_NAME;

  return {
    subject: `🎉 Happy Birthday ${displayName}!`,
    textBody: buildPlainText(displayName, options.senderName),
    htmlBody: buildHtml(displayName, options.senderName),
  };
}

function buildPlainText(name: string, senderName?: string): string {
  const lines: string[] = [];

  lines.push(`Happy Birthday ${name}! 🎂`);
  lines.push('');
  lines.push('Wishing you a fantastic day filled with joy, laughter, and all the things you love!');
  lines.push('');
  lines.push('May this year bring you success, happiness, and countless memorable moments.');
  lines.push('');
  lines.push(senderName ? 'Warm wishes,' : 'Warm wishes');
  if (senderName) {
    lines.push(senderName);
  }

  return lines.join('\n');
}

function buildHtml(name: string, senderName?: string): string {
  const signature = senderName
    ? `<p>Warm wishes,<br><strong>${escapeHtml(senderName)}</strong></p>`
    : '<p>Warm wishes</p>';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>Happy Birthday ${escapeHtml(name)}</title>
</head>
<body style="font-family: Arial, sans-serif; padding: 20px; background-color: #f4f4f4;">
  <div style="max-width: 600px; margin: 0 auto; background-color: white; padding: 30px; border-radius: 10px;">
    <h1 style="color: #FF6B6B; text-align: center;">🎉 Happy Birthday ${escapeHtml(name)}! 🎉</h1>
    <p style="font-size: 16px; line-height: 1.6; color: #333;">
      Wishing you a <strong>fantastic day</strong> filled with joy, laughter, and all the things you love!
    </p>
    <p style="font-size: 16px; line-height: 1.6; color: #333;">
      May this year bring you success, happiness, and countless memorable moments. 🌟
    </p>
    <div style="margin-top: 30px; padding-top: 20px; border-top: 2px solid #FF6B6B; text-align: center; color: #666;">
      ${signature}
    </div>
  </div>
</body>
</html>`;
}

/**
 * Escape HTML special characters
 */
export function escapeHtml(text: string): string {
  const escapeMap: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#039;',
  };
  return text.replace(/[&<>"']/g, (char) => escapeMap[char] ?? char);
}
