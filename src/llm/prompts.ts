// ============================================
// LLM Prompts — fixed texts of the assistant
// Customer-facing copy is Spanish.
// ============================================

/** Who the assistant speaks for; filled from config */
export interface BusinessProfile {
  name: string;
  website: string;
  contactEmail: string;
  contactPhone: string;
}

/**
 * Grounding rules placed at the top of every generation prompt.
 */
export function buildSystemInstructions(business: BusinessProfile): string {
  return (
    `Eres el asistente virtual oficial de ${business.name} (${business.website}). ` +
    "Responde siempre usando solo la informacion que aparece dentro del CONTEXTO y se muy conciso. " +
    "Si no encuentras la respuesta en el CONTEXTO, deja claro que no la tienes y sugiere visitar " +
    `la pagina web, escribir a ${business.contactEmail} o llamar al ${business.contactPhone}. ` +
    "Evita inventar precios, cursos o servicios que no esten citados. " +
    "Si el usuario vuelve a preguntar o dice que no entendio, reformula la respuesta con un lenguaje mas simple, ejemplos o pasos. " +
    "El historial de la conversacion solo sirve para mantener el tono; no lo uses como fuente de hechos."
  );
}

/** Extra guidance when the message is about courses */
export const COURSE_RESPONSE_GUIDELINES =
  "Cuando la pregunta sea sobre cursos, menciona primero la vision general de la oferta de cursos, " +
  "luego describe un curso especifico documentado en el CONTEXTO y cierra con el llamado a la accion, " +
  "sin negar cursos ni decir “no tengo informacion”.";

/** Appended to every non-greeting reply */
export const CONTACT_PROMPT =
  "También podés hacer clic en “Enviar mis datos” o escribir tus datos en el chat " +
  "para que coordinemos tu consulta, link de pago o llamada.";

/** Reply when the user shares an email or phone number */
export const CONTACT_ACK = "Gracias, hemos recibido tus datos y te contactaremos a la brevedad posible.";

/** Literal line the model continues from */
export const RESPONSE_MARKER = "RESPUESTA:";

/**
 * Reply used instead of generation when retrieval found nothing usable.
 */
export function getInsufficientInfoMessage(business: BusinessProfile): string {
  return (
    "No tengo suficiente informacion en la base de conocimiento para responder eso. " +
    `Por favor revisa ${business.website} o contactanos a ${business.contactEmail} ` +
    `o por telefono al ${business.contactPhone}.`
  );
}

/**
 * Asks the model not to repeat its last answer verbatim.
 * Empty when there is no previous assistant reply.
 */
export function buildPreviousAnswerBlock(lastAssistantReply: string | null): string {
  const reply = lastAssistantReply?.trim();
  if (!reply) return "";

  return [
    "Tu respuesta anterior fue:",
    '"""',
    reply,
    '"""',
    "El usuario volvio a consultar o indico que no entendio. " +
      "No repitas la misma redaccion ni estructura; explicalo con lenguaje mas simple, pasos o ejemplos, pero mantente preciso.",
  ].join("\n");
}

/**
 * Append the contact call-to-action once.
 * Adds a period first when the answer does not end in . ! or ?
 */
export function appendContactPrompt(answer: string): string {
  const stripped = answer.trim();
  if (!stripped) return CONTACT_PROMPT;
  if (stripped.includes(CONTACT_PROMPT)) return stripped;

  const punctuation = /[.!?]$/.test(stripped) ? "" : ".";
  return `${stripped}${punctuation} ${CONTACT_PROMPT}`;
}
