import type {
  CandidateProfile,
  ProfilingSession,
  ProfilingSideEffects,
  ProfilingState,
  ProfilingTurnResult,
} from "@shared/types/profiling";
import type { EntityExtractor } from "./entity-extractor";
import {
  CLARIFICATION_MESSAGE,
  DEFERRAL_MESSAGE,
  PROFILING_QUESTIONS,
  RESTART_NOTICE,
  buildCompletionMessage,
  buildConfirmationMessage,
} from "./prompts";

// After this many consecutive rejections of the summary, profiling restarts at
// the current-role question with a cleared profile.
export const MAX_CONFIRMATION_REJECTIONS = 3;

const DEFERRAL_PHRASES = ["no", "not ready", "maybe later"];
const CONFIRMATION_PHRASES = ["yes", "correct", "right"];

export function createEmptyProfile(): CandidateProfile {
  return {
    role: "",
    experienceLevel: "",
    targetRole: "",
    targetCompany: "",
    educationDetails: "",
  };
}

export function createProfilingSession(): ProfilingSession {
  return {
    state: "welcome",
    profile: createEmptyProfile(),
    completed: false,
    confirmationRejections: 0,
  };
}

// Back to WELCOME with an empty profile.
export function resetProfilingSession(): ProfilingSession {
  return createProfilingSession();
}

export function getCurrentQuestion(state: ProfilingState): string | null {
  return PROFILING_QUESTIONS[state] ?? null;
}

function noEffects(): ProfilingSideEffects {
  return {
    profileUpdated: false,
    deferred: false,
    clarificationRequested: false,
    restarted: false,
    profilingCompleted: false,
    handoff: false,
  };
}

function containsAny(text: string, phrases: string[]): boolean {
  const lower = text.toLowerCase();
  return phrases.some((phrase) => lower.includes(phrase));
}

function isStudent(role: string): boolean {
  return role.toLowerCase().includes("student");
}

function advance(
  session: ProfilingSession,
  state: ProfilingState,
  profile: CandidateProfile,
  prompt: string,
): ProfilingTurnResult {
  return {
    session: { ...session, state, profile },
    previousState: session.state,
    prompt,
    effects: { ...noEffects(), profileUpdated: profile !== session.profile },
  };
}

function question(state: ProfilingState): string {
  return PROFILING_QUESTIONS[state] ?? "";
}

/**
 * Consumes one user answer and returns the next session value, the prompt to
 * voice and the side effects of the turn. Returns null for an empty answer;
 * callers are expected to filter those before calling.
 */
export function processResponse(
  session: ProfilingSession,
  utterance: string,
  extractor: EntityExtractor,
): ProfilingTurnResult | null {
  const response = utterance.trim();
  if (!response) return null;

  const { profile } = session;

  switch (session.state) {
    case "welcome": {
      if (containsAny(response, DEFERRAL_PHRASES)) {
        return {
          session,
          previousState: session.state,
          prompt: DEFERRAL_MESSAGE,
          effects: { ...noEffects(), deferred: true },
        };
      }
      return advance(session, "current_role", profile, question("current_role"));
    }

    case "current_role": {
      const role = extractor.extractCurrentRole(response);
      const next: CandidateProfile = {
        ...profile,
        role,
        educationDetails: isStudent(role) ? response : profile.educationDetails,
      };
      return advance(session, "experience_level", next, question("experience_level"));
    }

    case "experience_level": {
      const next: CandidateProfile = {
        ...profile,
        experienceLevel: extractor.extractExperienceLevel(response),
        educationDetails: isStudent(profile.role)
          ? `${profile.educationDetails} ${response}`.trim()
          : profile.educationDetails,
      };
      return advance(session, "target_role", next, question("target_role"));
    }

    case "target_role": {
      const next: CandidateProfile = {
        ...profile,
        targetRole: extractor.extractTargetRole(response),
      };
      return advance(session, "target_company", next, question("target_company"));
    }

    case "target_company": {
      const next: CandidateProfile = {
        ...profile,
        targetCompany: extractor.extractTargetCompany(response),
      };
      return advance(session, "confirmation", next, buildConfirmationMessage(next));
    }

    case "confirmation": {
      if (containsAny(response, CONFIRMATION_PHRASES)) {
        return {
          session: {
            ...session,
            state: "completed",
            completed: true,
            confirmationRejections: 0,
          },
          previousState: session.state,
          prompt: buildCompletionMessage(profile),
          effects: { ...noEffects(), profilingCompleted: true },
        };
      }

      const rejections = session.confirmationRejections + 1;
      if (rejections >= MAX_CONFIRMATION_REJECTIONS) {
        return {
          session: {
            ...session,
            state: "current_role",
            profile: createEmptyProfile(),
            confirmationRejections: 0,
          },
          previousState: session.state,
          prompt: `${RESTART_NOTICE} ${question("current_role")}`,
          effects: { ...noEffects(), restarted: true, profileUpdated: true },
        };
      }

      return {
        session: { ...session, confirmationRejections: rejections },
        previousState: session.state,
        prompt: CLARIFICATION_MESSAGE,
        effects: { ...noEffects(), clarificationRequested: true },
      };
    }

    case "completed":
      return {
        session,
        previousState: session.state,
        prompt: null,
        effects: { ...noEffects(), handoff: true },
      };
  }
}
