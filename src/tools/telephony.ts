import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { ElevenLabsMcpError, invalidArgument } from "../lib/errors.js";
import {
  jsonResult,
  textResult,
  vendorDestructiveAnnotations,
  vendorReadAnnotations,
  vendorWriteAnnotations,
} from "../lib/helpers.js";
import {
  createPhoneNumberSchema,
  emptySchema,
  outboundCallSchema,
  phoneNumberIdSchema,
  updatePhoneNumberSchema,
} from "../lib/schemas.js";
import type { OutboundProvider } from "../lib/vendor/api.js";
import type { JsonObject, PhoneNumber } from "../lib/vendor/responses.js";
import { defineTool, type ToolContext } from "./context.js";

const PROVIDER_LABELS: Record<OutboundProvider, string> = {
  twilio: "Twilio",
  sip_trunk: "SIP trunk",
};

function outboundProvider(provider: string): OutboundProvider {
  const normalized = provider.toLowerCase();
  if (normalized === "twilio" || normalized === "sip_trunk") return normalized;
  throw invalidArgument(`Unsupported provider type: ${provider}`);
}

export function formatPhoneNumber(phone: PhoneNumber): string {
  const agent = phone.assigned_agent
    ? `${phone.assigned_agent.agent_name ?? "N/A"} (ID: ${phone.assigned_agent.agent_id})`
    : "None";
  return [
    `Phone Number: ${phone.phone_number}`,
    `ID: ${phone.phone_number_id}`,
    `Provider: ${phone.provider}`,
    `Label: ${phone.label ?? "N/A"}`,
    `Assigned Agent: ${agent}`,
  ].join("\n");
}

export function registerTelephonyTools(server: McpServer, ctx: ToolContext): void {
  defineTool(
    server,
    "list_phone_numbers",
    { title: "List Phone Numbers", description: "List all phone numbers of the account.", annotations: vendorReadAnnotations },
    emptySchema,
    async () => {
      const numbers = await ctx.api.listPhoneNumbers();
      if (numbers.length === 0) return textResult("No phone numbers found.");
      return textResult(`Phone Numbers:\n\n${numbers.map(formatPhoneNumber).join("\n\n")}`);
    },
  );

  defineTool(
    server,
    "create_phone_number",
    {
      title: "Create Phone Number",
      description: "Import a phone number. Twilio numbers need twilio_sid and twilio_token.",
      annotations: vendorWriteAnnotations,
    },
    createPhoneNumberSchema,
    async (args) => {
      const body: JsonObject = {
        phone_number: args.phone_number,
        provider: args.provider_type,
        label: args.label ?? args.phone_number,
      };
      if (args.provider_type === "twilio") {
        if (!args.twilio_sid || !args.twilio_token) {
          throw invalidArgument("twilio_sid and twilio_token are required for Twilio numbers.");
        }
        body.sid = args.twilio_sid;
        body.token = args.twilio_token;
      }
      const created = await ctx.api.createPhoneNumber(body);
      return textResult(`Phone number created: ${args.phone_number} (ID: ${created.phone_number_id})`);
    },
  );

  defineTool(
    server,
    "get_phone_number",
    { title: "Get Phone Number", description: "Get details of a phone number.", annotations: vendorReadAnnotations },
    phoneNumberIdSchema,
    async (args) => jsonResult(await ctx.api.getPhoneNumber(args.phone_number_id)),
  );

  defineTool(
    server,
    "update_phone_number",
    {
      title: "Update Phone Number",
      description: "Change a phone number's label or assigned agent.",
      annotations: vendorWriteAnnotations,
    },
    updatePhoneNumberSchema,
    async (args) => {
      if (args.label === undefined && args.agent_id === undefined) {
        throw invalidArgument("Provide label or agent_id to update.");
      }
      const updated = await ctx.api.updatePhoneNumber(args.phone_number_id, {
        ...(args.label !== undefined ? { label: args.label } : {}),
        ...(args.agent_id !== undefined ? { agent_id: args.agent_id } : {}),
      });
      return textResult(`Phone number updated: ${updated.phone_number} (ID: ${updated.phone_number_id})`);
    },
  );

  defineTool(
    server,
    "delete_phone_number",
    { title: "Delete Phone Number", description: "Delete a phone number.", annotations: vendorDestructiveAnnotations },
    phoneNumberIdSchema,
    async (args) => {
      await ctx.api.deletePhoneNumber(args.phone_number_id);
      return textResult(`Phone number ${args.phone_number_id} deleted successfully.`);
    },
  );

  defineTool(
    server,
    "make_outbound_call",
    {
      title: "Make Outbound Call",
      description:
        "Call a number (E.164) with an agent through one of the account's phone numbers. " +
        "The number's provider (Twilio or SIP trunk) picks the route.",
      annotations: vendorWriteAnnotations,
      costly: true,
    },
    outboundCallSchema,
    async (args) => {
      const numbers = await ctx.api.listPhoneNumbers();
      const phone = numbers.find((n) => n.phone_number_id === args.agent_phone_number_id);
      if (!phone) {
        throw new ElevenLabsMcpError("NotFound", `Phone number with ID ${args.agent_phone_number_id} not found.`);
      }
      const provider = outboundProvider(phone.provider);
      const response = await ctx.api.makeOutboundCall(provider, {
        agent_id: args.agent_id,
        agent_phone_number_id: args.agent_phone_number_id,
        to_number: args.to_number,
      });
      return textResult(`Outbound call initiated via ${PROVIDER_LABELS[provider]}: ${JSON.stringify(response)}.`);
    },
  );
}
