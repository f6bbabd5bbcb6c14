export function getSubnetParsePrompt(rawResponse: string): string {
    return `Parse this Alibaba Cloud VSwitches API response and return ONLY a JSON array of VSwitches.

Raw API Response:
${rawResponse}

Return ONLY a JSON array with this structure:
[
  {
    "subnet_id": "extracted vswitch id",
    "name": "extracted vswitch name or generate one",
    "cidr_block": "extracted cidr block",
    "availability_zone": "extracted zone",
    "status": "extracted status"
  }
]

Return ONLY the JSON array, no explanations.`;
}
