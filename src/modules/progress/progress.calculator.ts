/**
 * Course completion as an integer percentage, or null when the course has
 * no lessons. Values below 100 never round up to 100.
 */
export function calculateCourseProgress(completedLessons: number, totalLessons: number): number | null {
  if (totalLessons <= 0) {
    return null;
  }
  if (completedLessons >= totalLessons) {
    return 100;
  }
  return Math.min(99, Math.round((completedLessons / totalLessons) * 100));
}
