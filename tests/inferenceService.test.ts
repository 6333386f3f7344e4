import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
    buildSystemPrompt,
    buildUserPrompt,
    inferenceService,
    splitReasoning,
} from '../services/inferenceService.js';
import { personaService } from '../services/personaService.js';

const { createMock, constructorMock } = vi.hoisted(() => ({
    createMock: vi.fn(),
    constructorMock: vi.fn(),
}));

vi.mock('openai', () => ({
    default: vi.fn().mockImplementation((options: unknown) => {
        constructorMock(options);
        return { chat: { completions: { create: createMock } } };
    }),
}));

describe('splitReasoning', () => {
    it('separates the reasoning block from the answer', () => {
        expect(splitReasoning('<reasoning>step one</reasoning>\nParis')).toEqual({
            answer: 'Paris',
            reasoning: 'step one',
        });
    });

    it('returns plain text as the answer', () => {
        expect(splitReasoning('  Paris ')).toEqual({ answer: 'Paris' });
    });

    it('drops an empty reasoning block', () => {
        expect(splitReasoning('<reasoning> </reasoning>Paris')).toEqual({ answer: 'Paris' });
    });
});

describe('prompt builders', () => {
    it('omits the context section when there is no context', () => {
        expect(buildUserPrompt('Who wrote it?', '')).toBe('Query: Who wrote it?');
    });

    it('places context before the query', () => {
        expect(buildUserPrompt('q', 'ctx')).toBe('Context:\nctx\n\nQuery: q');
    });

    it('asks for reasoning tags only when thinking is shown', () => {
        const poet = personaService.getPersona('poet');
        expect(buildSystemPrompt(poet, false)).toBe('You are the poet assistant.');
        expect(buildSystemPrompt(poet, true)).toContain('<reasoning></reasoning>');
    });
});

describe('inferenceService.invoke', () => {
    beforeEach(() => {
        vi.clearAllMocks();
        vi.stubEnv('INFERENCE_MODEL', 'test-model');
        vi.stubEnv('INFERENCE_ENDPOINT', 'http://localhost:9999/v1');
        vi.stubEnv('INFERENCE_TEMPERATURE', '0.2');
        vi.stubEnv('API_KEY', 'test-secret');
    });

    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it('sends system and user messages and splits the reply', async () => {
        createMock.mockResolvedValueOnce({
            choices: [{ message: { content: '<reasoning>looked it up</reasoning>Paris' } }],
        });
        const persona = personaService.getPersona('librarian');

        const response = await inferenceService.invoke({
            query: 'capital?',
            context: 'Library documents:',
            showThinking: true,
            persona,
        });

        expect(response).toEqual({ answer: 'Paris', reasoning: 'looked it up' });
        expect(constructorMock).toHaveBeenCalledWith({ baseURL: 'http://localhost:9999/v1', apiKey: 'test-secret' });
        expect(createMock).toHaveBeenCalledWith(
            {
                model: 'test-model',
                temperature: 0.2,
                messages: [
                    { role: 'system', content: buildSystemPrompt(persona, true) },
                    { role: 'user', content: 'Context:\nLibrary documents:\n\nQuery: capital?' },
                ],
            },
            { signal: undefined }
        );
    });

    it('returns an empty answer when the model sends no content', async () => {
        createMock.mockResolvedValueOnce({ choices: [] });

        const response = await inferenceService.invoke({
            query: 'q',
            context: '',
            showThinking: false,
            persona: personaService.getPersona('poet'),
        });

        expect(response).toEqual({ answer: '' });
    });
});
