/**
 * Prompt for turning an unstructured DescribeVpcs response into a canonical VPC object
 */

export function getVpcParsePrompt(rawResponse: string, region: string): string {
    return `Parse this Alibaba Cloud VPC API response and convert it to a structured JSON format.

Raw API Response:
${rawResponse}

Please extract and return ONLY a JSON object with this exact structure:
{
  "vpc_id": "extracted vpc id",
  "vpc_name": "extracted vpc name or generate one if missing",
  "cidr_block": "extracted cidr block",
  "region": "${region}",
  "status": "extracted status",
  "subnets": [
    {
      "subnet_id": "extracted vswitch id",
      "name": "extracted vswitch name or generate one",
      "cidr_block": "extracted cidr block",
      "availability_zone": "extracted zone",
      "status": "extracted status"
    }
  ],
  "security_groups": [
    {
      "group_id": "extracted security group id",
      "name": "extracted security group name or generate one",
      "description": "extracted description",
      "rules": [
        {
          "protocol": "tcp",
          "port": "22",
          "source": "0.0.0.0/0",
          "direction": "ingress"
        }
      ]
    }
  ]
}

Each rule covers a single port, given as a string. "direction" is "ingress" or "egress".
Return ONLY the JSON, no explanations.`;
}
