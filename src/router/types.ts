// ============================================
// Router Types — Intent contracts
// Cheap deterministic classification decides whether a
// message ever reaches retrieval.
// ============================================

/**
 * Current router version.
 * Bump when classification tables or priority change.
 */
export const ROUTER_VERSION = "router.v2.0";

/**
 * Intent of one incoming message.
 * Priority when several apply: contact_share > greeting/courtesy > information_request.
 */
export type Intent =
  | { kind: "contact_share" }
  | { kind: "greeting"; reply: string }
  | { kind: "courtesy"; reply: string } // thanks, acknowledgements, farewells
  | { kind: "information_request"; normalized: string; courseIntent: boolean };

export type IntentKind = Intent["kind"];

/** Canned reply picked by the social classifier */
export type SocialReply = {
  reply: string;
  /** Greeting replies go out without the contact suffix */
  isGreeting: boolean;
};

/**
 * Source-path prefix → trigger keywords.
 * A prefix joins the filter set when any keyword is a substring
 * of the normalized message.
 */
export const SOURCE_INTENT_KEYWORDS: Readonly<Record<string, readonly string[]>> = {
  "faq/": ["faq", "preguntas frecuentes", "pregunta frecuente"],
  "servicios/": ["servicio", "servicios", "contratar", "ofrecemos", "diseno", "proyecto"],
  "cursos/": ["curso", "cursos", "capacitacion", "formacion", "taller", "educacion"],
  "software/": ["software", "cype", "sap2000", "etabs", "modelacion", "cypeunext"],
};

/** Any of these as a substring marks a course request */
export const COURSE_INTENT_KEYWORDS: readonly string[] = [
  "curso",
  "cursos",
  "capacitacion",
  "formacion",
  "taller",
  "instalaciones",
  "instalacion",
];

/** Interrogatives (and "por"/"para") never used as search keywords */
export const QUESTION_WORDS: ReadonlySet<string> = new Set([
  "quien",
  "quienes",
  "que",
  "como",
  "cuando",
  "donde",
  "por",
  "para",
  "cual",
  "cuales",
  "cuanto",
  "cuantos",
  "cuanta",
  "cuantas",
  "porque",
]);
