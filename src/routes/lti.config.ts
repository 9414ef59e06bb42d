import { readFile } from "node:fs/promises";

import type { FastifyPluginAsync } from "fastify";

const XML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;"
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);
}

export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) => {
    const value = values[key];
    return value === undefined ? placeholder : escapeXml(value);
  });
}

const ltiConfigRoute: FastifyPluginAsync = async (fastify) => {
  const template = await readFile(new URL("../../templates/lti.xml", import.meta.url), "utf8");

  fastify.get("/lti.xml", async (_request, reply) => {
    const { config } = fastify;

    reply.header("content-type", "application/xml; charset=utf-8");
    return renderTemplate(template, {
      title: config.LTI_TITLE,
      tool_id: config.LTI_TOOL_ID,
      domain: config.LTI_DOMAIN,
      launch_url: config.LTI_LAUNCH_URL
    });
  });
};

export default ltiConfigRoute;
