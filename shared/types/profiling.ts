export const PROFILING_STATES = [
  "welcome",
  "current_role",
  "experience_level",
  "target_role",
  "target_company",
  "confirmation",
  "completed",
] as const;

export type ProfilingState = (typeof PROFILING_STATES)[number];

export type CandidateProfile = {
  role: string;
  experienceLevel: string;
  targetRole: string;
  targetCompany: string;
  educationDetails: string;
};

export type ProfilingSession = {
  state: ProfilingState;
  profile: CandidateProfile;
  completed: boolean;
  // Consecutive "that's not right" answers while in confirmation
  confirmationRejections: number;
};

export type ProfilingSideEffects = {
  profileUpdated: boolean;
  deferred: boolean;
  clarificationRequested: boolean;
  restarted: boolean;
  profilingCompleted: boolean;
  // Profiling already finished; the utterance belongs to the interview flow
  handoff: boolean;
};

export type ProfilingTurnResult = {
  session: ProfilingSession;
  previousState: ProfilingState;
  prompt: string | null;
  effects: ProfilingSideEffects;
};

export type InterviewContext = {
  summary: string;
  currentRole: string;
  background: string;
  targetRole: string;
  targetCompany: string | null;
  suggestedQuestionCount: number;
  estimatedDurationMinutes: number;
};

export const OPEN_TO_OPPORTUNITIES = "Open to opportunities";
