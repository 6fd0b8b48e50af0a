import { AnalysisFailureKind, AnalysisMode, CycleFailureKind, CycleTrigger } from '../models/types';

export const FIRST_MESSAGE_LIMIT = 2000;
export const CONTINUATION_LIMIT = 1900;
export const CONTEXT_LIMIT = 2000;

// Limits are counted in code points so surrogate pairs (emoji) are never cut
function codePoints(text: string): string[] {
  return Array.from(text);
}

export function tailCodePoints(text: string, limit: number): string {
  const chars = codePoints(text);
  return chars.length <= limit ? text : chars.slice(chars.length - limit).join('');
}

// First message carries the header plus as much body as fits
export function splitReport(
  header: string,
  report: string,
  firstLimit = FIRST_MESSAGE_LIMIT,
  continuationLimit = CONTINUATION_LIMIT
): string[] {
  const headerLength = codePoints(header).length;
  if (headerLength >= firstLimit) {
    throw new Error(`Header of ${headerLength} characters does not fit in a ${firstLimit} character message`);
  }

  const body = codePoints(report);
  const firstBodyLength = firstLimit - headerLength;
  const messages = [header + body.slice(0, firstBodyLength).join('')];

  for (let offset = firstBodyLength; offset < body.length; offset += continuationLimit) {
    messages.push(body.slice(offset, offset + continuationLimit).join(''));
  }

  return messages;
}

export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function reportHeader(trigger: CycleTrigger): string {
  return trigger === CycleTrigger.FINAL
    ? '🏁 **Final analysis report**\n'
    : '📊 **Discussion analysis report**\n';
}

export function starterMessage(trigger: CycleTrigger, timestamp: string): string {
  switch (trigger) {
    case CycleTrigger.FINAL:
      return `🛑 **Session ended** (${timestamp})`;
    case CycleTrigger.MANUAL:
      return `🔍 **Manual analysis** (${timestamp})`;
    case CycleTrigger.SCHEDULED:
      return `📅 **Scheduled analysis** (${timestamp})`;
  }
}

export function threadTitle(trigger: CycleTrigger, timestamp: string): string {
  return trigger === CycleTrigger.FINAL
    ? `Discussion report (final) ${timestamp}`
    : `Discussion report ${timestamp}`;
}

export const NO_AUDIO_NOTICE = '🔇 No audio was captured since the last report.';

export function failureNotice(kind: CycleFailureKind, detail: string): string {
  switch (kind) {
    case AnalysisFailureKind.NO_CREDENTIAL:
      return '🔑 No Gemini API key is configured for this server. Set one with `/settings set_key`.';
    case AnalysisFailureKind.RATE_LIMITED:
      return '⏳ The analysis request limit (quota) was reached. The next scheduled analysis will try again.';
    case AnalysisFailureKind.UPLOAD_FAILED:
      return `⚠️ The audio could not be uploaded for analysis: ${detail}`;
    case AnalysisFailureKind.GENERIC_FAILURE:
      return `❌ Analysis failed: ${detail}`;
    case 'empty_report':
      return '⚠️ The analysis returned an empty report.';
  }
}

export function countdownMessage(remainingSeconds: number, mode: AnalysisMode): string {
  const minutes = Math.max(1, Math.ceil(remainingSeconds / 60));
  return `🎙️ Recording (mode: ${mode}). Next analysis in about ${minutes} min.`;
}
