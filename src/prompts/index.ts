/**
 * Prompts for the model-backed stages
 *
 * Parse prompts demand bare JSON; the generation prompt demands bare CDK code.
 */

import { getVpcParsePrompt } from './vpc_parse';
import { getSubnetParsePrompt } from './subnet_parse';
import { getStackGenerationPrompt } from './stack_generation';

export { getVpcParsePrompt, getSubnetParsePrompt, getStackGenerationPrompt };
