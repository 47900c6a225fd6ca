// System prompt sent with every completion request
export const CLIP_ANALYST_SYSTEM_PROMPT = `
You are a viral short-form content expert working inside an automated video pipeline.
You MUST respond ONLY with the JSON requested by the user message.
Do not add any explanatory text before or after the JSON.
`;

// Instructions placed in front of the transcript when asking for segments
export const SEGMENT_INSTRUCTIONS = `
Provided to you is a timestamped transcript of a video.
Identify every segment that can be extracted as engaging, viral short-form content (15-60 seconds).

STRICT TIMESTAMP CONSTRAINTS:
- start and end are ABSOLUTE seconds from the beginning of the video
- 0 <= start < end <= {{duration}}
- Use the transcript timestamps as anchors, do NOT invent times outside the video
- Every segment must be a continuous time range

For each segment provide:
- start: number (seconds)
- end: number (seconds)
- title: a catchy title (max 70 characters)
- hook: what grabs attention in the first 3-5 seconds
- description: a brief summary of why the segment is engaging
- platforms: any of {{platforms}}
- hashtags: relevant hashtags, e.g. ["#viral", "#storytime"]

Rules:
- Return ONLY a JSON array of segment objects
- Do NOT wrap the array in an object
- Do NOT include explanations

JSON format:
[
  {
    "start": number,
    "end": number,
    "title": string,
    "hook": string,
    "description": string,
    "platforms": string[],
    "hashtags": string[]
  }
]
`;

// Instructions for the caption translation fallback
export const TRANSLATION_INSTRUCTIONS = `
Translate every caption line below into the language with code "{{language}}".

Rules:
- Return ONLY a JSON array of strings
- The array MUST have exactly {{count}} items, in the same order as the input
- Translate meaning, keep it short enough for captions
- Do NOT merge or split lines
`;
