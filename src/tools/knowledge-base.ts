import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import {
  jsonResult,
  textResult,
  vendorDestructiveAnnotations,
  vendorReadAnnotations,
  vendorWriteAnnotations,
} from "../lib/helpers.js";
import {
  computeRagIndexSchema,
  deleteDocumentSchema,
  deleteRagIndexSchema,
  documentChunkSchema,
  documentFromFileSchema,
  documentFromTextSchema,
  documentFromUrlSchema,
  documentIdSchema,
  emptySchema,
  listDocumentsSchema,
  updateDocumentSchema,
} from "../lib/schemas.js";
import type { DependentAgents } from "../lib/vendor/responses.js";
import { defineTool, readInputFile, type ToolContext } from "./context.js";

/** Shared by document and platform-tool dependency listings. */
export function formatDependentAgents(subject: string, dependents: DependentAgents): string {
  if (dependents.agents.length === 0) return `No agents depend on ${subject}`;
  const lines = [`Agents depending on ${subject}:`, ""];
  for (const agent of dependents.agents) {
    lines.push(`Agent ID: ${agent.agent_id ?? agent.id ?? "N/A"}`, `Agent Name: ${agent.name ?? "N/A"}`, "");
  }
  return lines.join("\n");
}

export function formatSize(bytes: number): string {
  return `Knowledge base size: ${bytes.toLocaleString("en-US")} bytes (${(bytes / (1024 * 1024)).toFixed(2)} MB)`;
}

export function registerKnowledgeBaseTools(server: McpServer, ctx: ToolContext): void {
  defineTool(
    server,
    "list_knowledge_base_documents",
    { title: "List Knowledge Base Documents", description: "List knowledge base documents.", annotations: vendorReadAnnotations },
    listDocumentsSchema,
    async (args) => {
      const { documents } = await ctx.api.listKnowledgeBase({
        page_size: args.page_size,
        ...(args.search ? { search: args.search } : {}),
        ...(args.cursor ? { cursor: args.cursor } : {}),
      });
      const lines = [`Knowledge Base Documents: ${documents.length}`];
      for (const doc of documents) {
        lines.push(`Name: ${doc.name}`, `ID: ${doc.id}`, `Type: ${doc.type ?? "N/A"}`, "");
      }
      return textResult(lines.join("\n"));
    },
  );

  defineTool(
    server,
    "get_knowledge_base_document",
    { title: "Get Knowledge Base Document", description: "Get a knowledge base document.", annotations: vendorReadAnnotations },
    documentIdSchema,
    async (args) => jsonResult(await ctx.api.getKnowledgeBaseDocument(args.document_id)),
  );

  defineTool(
    server,
    "create_knowledge_base_from_url",
    { title: "Create Knowledge Base from URL", description: "Create a knowledge base document from a web page.", annotations: vendorWriteAnnotations },
    documentFromUrlSchema,
    async (args) => {
      const doc = await ctx.api.createKnowledgeBaseFromUrl(args.url, args.name);
      return textResult(`Knowledge base created from URL: ${doc.name ?? args.name} (ID: ${doc.id})`);
    },
  );

  defineTool(
    server,
    "create_knowledge_base_from_text",
    { title: "Create Knowledge Base from Text", description: "Create a knowledge base document from text.", annotations: vendorWriteAnnotations },
    documentFromTextSchema,
    async (args) => {
      const doc = await ctx.api.createKnowledgeBaseFromText(args.text, args.name);
      return textResult(`Knowledge base created from text: ${doc.name ?? args.name} (ID: ${doc.id})`);
    },
  );

  defineTool(
    server,
    "create_knowledge_base_document_from_file",
    {
      title: "Create Knowledge Base from File",
      description: "Upload a local file (epub, pdf, docx, txt or html) as a knowledge base document.",
      annotations: vendorWriteAnnotations,
    },
    documentFromFileSchema,
    async (args) => {
      const input = await readInputFile(ctx, args.file_path, false);
      const doc = await ctx.api.createKnowledgeBaseFromFile(input.file, args.name);
      return textResult(`Knowledge base created from file: ${doc.name ?? args.name ?? input.file.filename} (ID: ${doc.id})`);
    },
  );

  defineTool(
    server,
    "delete_knowledge_base_document",
    {
      title: "Delete Knowledge Base Document",
      description: "Delete a knowledge base document. force also removes it from dependent agents.",
      annotations: vendorDestructiveAnnotations,
    },
    deleteDocumentSchema,
    async (args) => {
      await ctx.api.deleteKnowledgeBaseDocument(args.document_id, args.force);
      return textResult(`Knowledge base document ${args.document_id} deleted successfully.`);
    },
  );

  defineTool(
    server,
    "update_knowledge_base_document",
    { title: "Update Knowledge Base Document", description: "Rename a knowledge base document.", annotations: vendorWriteAnnotations },
    updateDocumentSchema,
    async (args) => {
      const doc = await ctx.api.updateKnowledgeBaseDocument(args.document_id, args.name);
      return textResult(`Knowledge base document ${args.document_id} updated successfully.\n${JSON.stringify(doc, null, 2)}`);
    },
  );

  defineTool(
    server,
    "get_document_content",
    { title: "Get Document Content", description: "Get the full content of a knowledge base document.", annotations: vendorReadAnnotations },
    documentIdSchema,
    async (args) => {
      const content = await ctx.api.getKnowledgeBaseContent(args.document_id);
      return textResult(`Document ${args.document_id} content:\n\n${content}`);
    },
  );

  defineTool(
    server,
    "get_document_chunk",
    { title: "Get Document Chunk", description: "Get a chunk of a knowledge base document.", annotations: vendorReadAnnotations },
    documentChunkSchema,
    async (args) => jsonResult(await ctx.api.getKnowledgeBaseChunk(args.document_id, args.chunk_id)),
  );

  defineTool(
    server,
    "get_knowledge_base_size",
    { title: "Get Knowledge Base Size", description: "Get the total size of the knowledge base.", annotations: vendorReadAnnotations },
    emptySchema,
    async () => textResult(formatSize((await ctx.api.getKnowledgeBaseSize()).size_bytes)),
  );

  defineTool(
    server,
    "get_document_dependent_agents",
    {
      title: "Get Document Dependent Agents",
      description: "List the agents that use a knowledge base document.",
      annotations: vendorReadAnnotations,
    },
    documentIdSchema,
    async (args) => {
      const dependents = await ctx.api.getKnowledgeBaseDependentAgents(args.document_id);
      return textResult(formatDependentAgents(`document ${args.document_id}`, dependents));
    },
  );

  defineTool(
    server,
    "compute_rag_index",
    {
      title: "Compute RAG Index",
      description: "Start RAG indexing of a document with an embedding model (e5_mistral_7b_instruct or multilingual_e5_large_instruct).",
      annotations: vendorWriteAnnotations,
    },
    computeRagIndexSchema,
    async (args) => {
      const result = await ctx.api.computeRagIndex(args.document_id, args.model);
      return textResult(`RAG index computation started for document ${args.document_id}.\n${JSON.stringify(result, null, 2)}`);
    },
  );

  defineTool(
    server,
    "get_rag_index",
    { title: "Get RAG Index", description: "List the RAG indexes of a document.", annotations: vendorReadAnnotations },
    documentIdSchema,
    async (args) => {
      const { indexes } = await ctx.api.getRagIndexes(args.document_id);
      if (indexes.length === 0) return textResult(`No RAG indexes found for document ${args.document_id}`);
      const lines = [`RAG Indexes for document ${args.document_id}:`, ""];
      for (const index of indexes) {
        lines.push(
          `Index ID: ${index.id}`,
          `Model: ${index.model ?? "N/A"}`,
          `Status: ${index.status ?? "N/A"}`,
          `Progress: ${index.progress_percentage ?? 0}%`,
          "",
        );
      }
      return textResult(lines.join("\n"));
    },
  );

  defineTool(
    server,
    "get_rag_index_overview",
    { title: "Get RAG Index Overview", description: "Overview of all RAG indexes in the workspace.", annotations: vendorReadAnnotations },
    emptySchema,
    async () => jsonResult(await ctx.api.getRagIndexOverview()),
  );

  defineTool(
    server,
    "delete_rag_index",
    { title: "Delete RAG Index", description: "Delete a RAG index of a document.", annotations: vendorDestructiveAnnotations },
    deleteRagIndexSchema,
    async (args) => {
      await ctx.api.deleteRagIndex(args.document_id, args.rag_index_id);
      return textResult(`RAG index ${args.rag_index_id} deleted successfully from document ${args.document_id}.`);
    },
  );
}
