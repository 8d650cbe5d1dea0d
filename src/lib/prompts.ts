// Fixed prompts for each script. The JSON shapes they request are mirrored in schemas.ts.

export const LIKELIHOOD_SYSTEM_PROMPT = [
  'Analyze whether the following event description could realistically occur in 2026.',
  'Return STRICT JSON ONLY with the required schema. Do not include extra text.',
  'Please evaluate:',
  '1. **Factual Accuracy**: Are the people, organizations, and relationships mentioned realistic and factually plausible?',
  '2. **Timeline Feasibility**: Is the specified date/timeframe reasonable?',
  '3. **Real-world Plausibility**: Could this scenario actually happen given current knowledge of the people/organizations involved?',
  'Even though the possibility is low, if it is not impossible, please consider it as possible.',
].join(' ');

export const LIKELIHOOD_INSTRUCTIONS = `Given an array of items, each with fields {id, description}, assess each item and output a JSON object with this exact shape:

{
  "results": [
    {
      "id": string,
      "possible_in_2026": boolean,
      "likelihood": "impossible" | "low" | "medium" | "high",
      "rationale": string
    }
  ]
}

Rules:
- Base the judgment on general plausibility by 2026 (not certainty).
- If the scenario is absolutely impossible in 2026, then possible_in_2026 = false, otherwise true.
- Use concise, concrete rationale (<= 2 sentences).
- The array order in results must follow the input order.
- Answer in English.
`;

export const STATEMENT_SYSTEM_PROMPT =
  'You are a data transformation assistant. Always follow the rules strictly and output valid JSON only.';

export const STATEMENT_INSTRUCTIONS = `TASK
You will receive an array named "Input" that contains objects with fields:
- id (string or number)
- description (string)

For EACH item in Input, generate FOUR true/false statements with likelihood labels:
- "Highly likely"
- "Possible"
- "Unlikely"
- "Highly unlikely"

GENERATION RULES
- Use ONLY information present in the item's 'description'; do not add external facts.
- Preserve key entities, dates, organizations, and roles.
- Create statements as follows:
  • Highly likely: a faithful, tight paraphrase that would be true if the description is true.
  • Possible: a softened variant (e.g., "around 2026", "may have"), still consistent with the description.
  • Unlikely: a plausible-sounding inversion of the core relation (e.g., joined↔left, continued↔ended).
  • Highly unlikely: a strong contradiction or role reversal that clearly conflicts with the description.
- Avoid hedging words in "Highly likely" and "Highly unlikely".
- Keep each statement ≤ 30 words.
- Do NOT include analysis or explanations—output JSON only.

OUTPUT FORMAT
- Return a single JSON ARRAY (not prose). The array length must be exactly 4 × len(Input).
- Each element is an object:
  {
    "id": "<original-id>_<suffix>",  // suffix ∈ {"highly_likely","possible","unlikely","highly_unlikely"}
    "statement": "<the generated true/false statement>",
    "label": "Highly likely" | "Possible" | "Unlikely" | "Highly unlikely"
  }

VALIDATION
- If the description lacks enough detail to invert safely, keep entities/timeframe but invert the main relation reasonably.
- If exact dates appear (e.g., "2026-01-01"), keep them exact in "Highly likely"; in "Possible" you may relax to "around 2026".
`;

export const RAG_SYSTEM_PROMPT =
  'You are a reasoning assistant. Always follow the rules strictly and output valid JSON only.';

/** Batch prompt: the instructions, then the batch as indented JSON after `Input:`. */
export function buildBatchUserContent(instructions: string, items: unknown[]): string {
  return `${instructions}\nInput:\n${JSON.stringify(items, null, 2)}`;
}

export function buildRagUserContent(context: string, statement: string): string {
  return `TASK
- You will be given two inputs:
  1) A context passage (retrieved text).
  2) A true/false statement (the claim).

- Consider BOTH:
  • The context passage (RAG input)
  • Your own built-in knowledge

- Your goal is to decide whether the claim is true or false, and explain whether your judgment comes from the context passage, your own knowledge, or both.

OUTPUT FORMAT
Return your answer as a JSON object with the following fields:
{
  "statement": "<the input statement>",
  "answer": "True" | "False",
  "reasoning": "<explain whether you relied on RAG, your own knowledge, or noticed a conflict between them>"
}

INPUT
Context passage:
<<<
${context}
>>>

Statement:
${statement}
`;
}
