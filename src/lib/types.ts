export const SESSION_COOKIE_NAME = "quiz_extensions_session";

export const STAFF_ENROLLMENT_TYPES = [
  "TeacherEnrollment",
  "TaEnrollment",
  "DesignerEnrollment"
] as const;

export interface CanvasCourse {
  id: number;
  name: string;
  enrollment_term_id: number | null;
}

export interface CanvasUser {
  id: number;
  name: string | null;
  sortable_name: string;
  sis_user_id: string | null;
}

export interface CanvasQuiz {
  id: number;
  title: string;
  time_limit: number | null;
}

export interface CanvasEnrollment {
  id: number;
  user_id: number;
  type: string;
}

export interface QuizExtension {
  user_id: number;
  extra_time: number;
}

export interface UserSearchPage {
  users: CanvasUser[];
  pageCount: number;
}

export interface ExtendQuizResult {
  success: boolean;
  message: string;
  /** minutes added, or null when nothing was pushed or the push failed */
  addedTime: number | null;
}
