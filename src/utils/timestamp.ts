/**
 * 타임스탬프 유틸리티
 */

function pad(value: number, length = 2): string {
  return String(value).padStart(length, "0");
}

/**
 * 타임존 정보가 포함된 타임스탬프 생성
 * ISO 8601 형식 (예: 2025-10-30T12:34:56.789+09:00)
 *
 * - 시스템의 로컬 타임존 사용 (TZ 환경 변수)
 * - 밀리초 단위까지 기록
 */
export function getTimestampWithTimezone(now: Date = new Date()): string {
  const offset = -now.getTimezoneOffset();
  const offsetSign = offset >= 0 ? "+" : "-";
  const offsetHours = pad(Math.floor(Math.abs(offset) / 60));
  const offsetMinutes = pad(Math.abs(offset) % 60);

  return (
    `${getDateStringWithDash(now)}T${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}` +
    `.${pad(now.getMilliseconds(), 3)}${offsetSign}${offsetHours}:${offsetMinutes}`
  );
}

/**
 * YYYY-MM-DD 형식의 날짜 문자열 (로컬 타임존 기준)
 * 로그 디렉터리명으로 사용
 */
export function getDateStringWithDash(now: Date = new Date()): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}
