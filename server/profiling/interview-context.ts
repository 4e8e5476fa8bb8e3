import {
  OPEN_TO_OPPORTUNITIES,
  type CandidateProfile,
  type InterviewContext,
} from "@shared/types/profiling";

const DEFAULT_QUESTION_COUNT = 6;
const MINUTES_PER_QUESTION = 2;

function describeBackground(profile: CandidateProfile): string {
  if (profile.educationDetails) {
    return profile.educationDetails;
  }
  return profile.experienceLevel ? `${profile.experienceLevel} of experience` : "";
}

export function buildInterviewContext(profile: CandidateProfile): InterviewContext {
  const targetCompany =
    profile.targetCompany && profile.targetCompany !== OPEN_TO_OPPORTUNITIES
      ? profile.targetCompany
      : null;
  const background = describeBackground(profile);

  const summaryParts = [`Current role: ${profile.role || "not stated"}.`];
  if (background) summaryParts.push(`Background: ${background}.`);
  summaryParts.push(
    targetCompany
      ? `Preparing for a ${profile.targetRole} interview at ${targetCompany}.`
      : `Preparing for ${profile.targetRole} interviews, open to opportunities.`,
  );

  return {
    summary: summaryParts.join(" "),
    currentRole: profile.role,
    background,
    targetRole: profile.targetRole,
    targetCompany,
    suggestedQuestionCount: DEFAULT_QUESTION_COUNT,
    estimatedDurationMinutes: DEFAULT_QUESTION_COUNT * MINUTES_PER_QUESTION,
  };
}
