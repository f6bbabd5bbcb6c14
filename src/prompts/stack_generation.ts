/**
 * Stack generation prompt
 *
 * The generated text replaces the stack file wholesale, so the model is told
 * to emit code only and to avoid anything needing a manual edit afterwards.
 */

export function getStackGenerationPrompt(description: string): string {
    return `Generate AWS CDK code for: ${description}. ` +
        'IMPORTANT: The output should only have CDK code, without any additional comments. ' +
        'I will directly replace all output into a typescript file for CDK project and run it, ' +
        'therefore do not add env variables that requires code update.';
}
