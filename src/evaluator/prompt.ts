/**
 * Evaluation prompt template. The idea is interpolated verbatim; wording is fixed.
 */

import type { StartupIdea } from "../lib/schemas/evaluation.js";

export function buildEvaluationPrompt(idea: StartupIdea): string {
  return `
You are a startup evaluator. Analyze the following startup idea and return valid JSON only. Do not repeat input.

Startup:
Title: ${idea.title}
Problem: ${idea.problem}
Solution: ${idea.solution}
Audience: ${idea.audience}
Business Model: ${idea.businessModel}

Output JSON format:
{
  "isGibberish": boolean,
  "score": {
    "overall": number [0-100],
    "marketPotential": number [0-100],
    "technicalFeasibility": number [0-100]
  },
  "swotAnalysis": {
    "strengths": [string, ...],
    "weaknesses": [string, ...],
    "opportunities": [string, ...],
    "threats": [string, ...]
  },
  "mvpSuggestions": [string, string, string],
  "businessModelIdeas": [string, ...],
  "marketAnalysis": {
    "targetMarket": string,
    "tam": string (total addressable market in USD, numeric format only, e.g. "$1500000000", and mention the user types or groups included in TAM),
    "sam": string (serviceable available market in USD, and mention who is actually reachable based on your scope),
    "som": string (serviceable obtainable market in USD, and mention who is most likely to convert first),
    "growthRate": string (state the CAGR or growth and the reason behind this growth based on market forces or user demand),
    "trends": [string, ...],
    "competitors": [string, ...],
    "customerNeeds": [string, ...],
    "barriersToEntry": [string, ...]
  }
}
- Return only valid JSON
- Do not repeat or rephrase the input.
- No markdown, no commentary.
`;
}
