import {
  OPEN_TO_OPPORTUNITIES,
  type CandidateProfile,
  type ProfilingState,
} from "@shared/types/profiling";

export const PROFILING_QUESTIONS: Partial<Record<ProfilingState, string>> = {
  welcome:
    "Hello! I'm your interview coach, and I'm here to help you practice for your upcoming interview. " +
    "To give you the most personalized experience, I'd like to learn a bit about you first. " +
    "This will only take 2-3 minutes. Are you ready to get started?",
  current_role:
    "Great! Let's start with your background. What's your current role or educational status? " +
    "For example, are you a student, software engineer, product manager, or in another field?",
  experience_level:
    "Thanks for sharing that! Now, could you tell me about your experience level? " +
    "If you're a student, what year are you in and which college? " +
    "If you're working, how many years of experience do you have in your field?",
  target_role:
    "Perfect! Now, what specific role are you preparing for? For example, are you targeting positions like " +
    "'Product Manager', 'Software Engineer', 'Data Analyst', or something else?",
  target_company:
    "Excellent! Do you have any specific companies in mind that you're targeting? " +
    "For instance, 'Google', 'Microsoft', 'Razorpay', or 'Amazon'? " +
    "If not, just say 'no specific company' and that's perfectly fine too.",
  confirmation: "Let me confirm what I've understood about your profile:",
};

export const DEFERRAL_MESSAGE =
  "No problem! When you're ready to start your interview preparation, just let me know " +
  "and we can begin the profiling process.";

export const CLARIFICATION_MESSAGE =
  "I'd like to make sure I have your information right. Could you please clarify what needs to be corrected? " +
  "You can tell me which part is wrong and I'll ask you about it again.";

export const RESTART_NOTICE =
  "Let's go through it again from the top so I get everything right.";

export function buildConfirmationMessage(profile: CandidateProfile): string {
  const lines = [
    `${PROFILING_QUESTIONS.confirmation}`,
    "",
    `• Current Role: ${profile.role}`,
    profile.educationDetails
      ? `• Education: ${profile.educationDetails}`
      : `• Experience Level: ${profile.experienceLevel}`,
    `• Target Role: ${profile.targetRole}`,
    `• Target Company: ${profile.targetCompany}`,
    "",
    "Is this information correct? Please say 'yes' if everything looks good, or let me know what needs to be corrected.",
  ];
  return lines.join("\n");
}

export function buildCompletionMessage(profile: CandidateProfile): string {
  const tailored =
    profile.targetCompany !== OPEN_TO_OPPORTUNITIES
      ? `I'll now conduct a personalized interview practice session tailored for the ${profile.targetRole} position at ${profile.targetCompany}. `
      : `I'll now conduct a personalized interview practice session tailored for ${profile.targetRole} positions. `;

  return (
    "Perfect! I now have a complete picture of your background and goals. " +
    tailored +
    "This interview will include questions specifically chosen based on your experience level and target role. " +
    "I'll ask you 5-7 questions over the next 10-15 minutes. Are you ready to begin your practice interview?"
  );
}
