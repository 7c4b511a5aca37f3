import type { Tool } from "@modelcontextprotocol/sdk/types.js";

// Tool definitions for ListTools response
export const toolDefinitions: Tool[] = [
  // Task Tools
  {
    name: "vergeos_task_wait",
    description:
      "Wait for a VergeOS task to finish. Returns as soon as the task is idle, fails if it errors or disappears, and times out after timeoutSeconds.",
    inputSchema: {
      type: "object",
      properties: {
        taskId: {
          type: ["string", "number"],
          description: "Task key",
        },
        timeoutSeconds: {
          type: "number",
          description: "Give up after this many seconds; 0 waits forever (default: server setting)",
        },
        pollingIntervalSeconds: {
          type: "number",
          description: "Seconds between status checks, 1-60 (default: server setting)",
        },
        passThru: {
          type: "boolean",
          description: "Return the full task record once it finishes",
        },
      },
      required: ["taskId"],
    },
  },

  // Import Tools
  {
    name: "vergeos_vm_import_wait",
    description: "Wait for a VM import job to complete and return the imported VM key",
    inputSchema: {
      type: "object",
      properties: {
        importId: {
          type: ["string", "number"],
          description: "VM import job key",
        },
        timeoutSeconds: {
          type: "number",
          description: "Give up after this many seconds; 0 waits forever (default: server setting)",
        },
        pollingIntervalSeconds: {
          type: "number",
          description: "Seconds between status checks, 1-60 (default: server setting)",
        },
      },
      required: ["importId"],
    },
  },

  // NAS Tools
  {
    name: "vergeos_nas_volume_browse",
    description: "List the files in a directory of a NAS volume",
    inputSchema: {
      type: "object",
      properties: {
        volumeId: {
          type: "string",
          description: "NAS volume key",
        },
        path: {
          type: "string",
          description: "Directory to list (default: /)",
        },
      },
      required: ["volumeId"],
    },
  },

  // File Tools
  {
    name: "vergeos_file_upload",
    description: "Upload a local file (ISO, disk image, OVA) to the VergeOS media catalog in chunks",
    inputSchema: {
      type: "object",
      properties: {
        path: {
          type: "string",
          description: "Local file to upload",
        },
        name: {
          type: "string",
          description: "Name in the catalog (default: the local file name)",
        },
        description: {
          type: "string",
          description: "Optional description",
        },
        tier: {
          type: "number",
          enum: [1, 2, 3, 4, 5],
          description: "Preferred storage tier",
        },
      },
      required: ["path"],
    },
  },
  {
    name: "vergeos_file_download",
    description: "Download a file from the VergeOS media catalog to a local path",
    inputSchema: {
      type: "object",
      properties: {
        fileId: {
          type: ["string", "number"],
          description: "File key",
        },
        destination: {
          type: "string",
          description: "Local file path, or an existing directory when filename is given",
        },
        filename: {
          type: "string",
          description: "File name to request and to save under in a destination directory",
        },
        force: {
          type: "boolean",
          description: "Overwrite an existing local file (refused in safe mode)",
        },
      },
      required: ["fileId", "destination"],
    },
  },
];
