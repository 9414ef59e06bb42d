import type { CanvasClient } from "./canvasClient.js";
import type { CanvasQuiz, ExtendQuizResult, QuizExtension } from "./types.js";

/**
 * Extra minutes needed for `percent`% of the time limit: ceil(limit * (percent - 100) / 100).
 * Null when the quiz has no time limit. Percents under 100 are not rejected
 * here and yield a negative value.
 */
export function computeAddedTime(
  timeLimit: number | null | undefined,
  percent: number
): number | null {
  if (timeLimit === null || timeLimit === undefined || timeLimit < 1) {
    return null;
  }

  const addedTime = Math.ceil(timeLimit * ((percent - 100) / 100));
  // ceil can produce -0 for percents just under 100
  return addedTime === 0 ? 0 : addedTime;
}

export function buildQuizExtensions(userIds: number[], extraTime: number): QuizExtension[] {
  return userIds.map((userId) => ({ user_id: userId, extra_time: extraTime }));
}

/**
 * Pushes one extension batch for `quiz` to Canvas. Quizzes without a time
 * limit succeed without a request.
 */
export async function extendQuiz(
  canvas: CanvasClient,
  courseId: number,
  quiz: CanvasQuiz,
  percent: number,
  userIds: number[]
): Promise<ExtendQuizResult> {
  const addedTime = computeAddedTime(quiz.time_limit, percent);

  if (addedTime === null) {
    return {
      success: true,
      message: `Quiz #${quiz.id} has no time limit, so there is no time to add.`,
      addedTime: null
    };
  }

  const status = await canvas.createQuizExtensions(
    courseId,
    quiz.id,
    buildQuizExtensions(userIds, addedTime)
  );

  if (status === 200) {
    return {
      success: true,
      message: `Successfully added ${addedTime} minutes to quiz #${quiz.id}`,
      addedTime
    };
  }

  return {
    success: false,
    message: `Error creating extension for quiz #${quiz.id}. Canvas status code: ${status}`,
    addedTime: null
  };
}
