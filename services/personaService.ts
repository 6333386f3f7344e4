import type { Persona, PersonaName } from '../types.js';
import { ConfigurationError } from './errors.js';

// New personas are rows here, not new types.
const PERSONAS: Readonly<Record<PersonaName, Readonly<Persona>>> = Object.freeze({
    poet: Object.freeze({ name: 'poet', dataSource: 'none', revealReasoningDefault: false, trace: true }),
    librarian: Object.freeze({ name: 'librarian', dataSource: 'library', revealReasoningDefault: true, trace: true }),
    researcher: Object.freeze({ name: 'researcher', dataSource: 'internet', revealReasoningDefault: true, trace: true }),
} satisfies Record<PersonaName, Persona>);

export const DEFAULT_PERSONA: PersonaName = 'librarian';

export const isPersonaName = (value: unknown): value is PersonaName =>
    typeof value === 'string' && Object.prototype.hasOwnProperty.call(PERSONAS, value);

export const personaService = {
    listPersonas: (): Persona[] => Object.values(PERSONAS),

    /**
     * Resolves a persona by name, case-insensitively.
     */
    getPersona: (name: string): Persona => {
        const key = name.trim().toLowerCase();
        if (!isPersonaName(key)) {
            const valid = Object.keys(PERSONAS).join(', ');
            throw new ConfigurationError('persona', `Unknown persona '${name}'. Valid: ${valid}`);
        }
        return PERSONAS[key];
    },
};
