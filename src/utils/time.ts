export function epochSecondsNow(): number {
  return Math.floor(Date.now() / 1000);
}
