import { execFile } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { promisify } from "node:util";
import YAML from "yaml";
import type { BuildControl, BuildInvocation, BuilderOutcome, ImageBuilder } from "./builder.js";

const pExecFile = promisify(execFile);

export const TEMPLATE_FILE = "packer.json";
const STAGE_UPLOAD_DIR = "/tmp/genesis-stage";
const DEV_KEY_UPLOAD_PATH = "/tmp/genesis-dev-key.pub";
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export type PackerTemplate = {
  variables: Record<string, string>;
  builders: Record<string, unknown>[];
  provisioners: Record<string, unknown>[];
};

type ExecFailure = Error & {
  code?: number | string | null;
  killed?: boolean;
  signal?: string | null;
  stdout?: string;
  stderr?: string;
};

function isExecFailure(e: unknown): e is ExecFailure {
  return e instanceof Error && "code" in e;
}

/**
 * Render the Packer (JSON) template for one image: a qemu builder seeded
 * from the merged parameters, then provisioners that copy the staged
 * dependency tree into the image root, install the developer key and run
 * the provisioning script.
 *
 * Forwarded variables are read by Packer from its own environment, so
 * their values never land in the template file.
 */
export function renderPackerTemplate(inv: BuildInvocation): PackerTemplate {
  const { parameters } = inv;

  const variables: Record<string, string> = {};
  for (const name of parameters.envNames) {
    variables[name] = `{{env \`${name}\`}}`;
  }

  const sshUser = String(parameters.variables.ssh_username ?? "");
  const sshPassword = String(parameters.variables.ssh_password ?? "");
  const userData =
    "#cloud-config\n" +
    YAML.stringify({
      ssh_pwauth: true,
      users: [
        {
          name: sshUser,
          plain_text_passwd: sshPassword,
          lock_passwd: false,
          sudo: "ALL=(ALL) NOPASSWD:ALL",
          shell: "/bin/bash",
        },
      ],
    });

  const builder: Record<string, unknown> = {
    type: "qemu",
    ...parameters.variables,
    vm_name: path.basename(inv.destination),
    output_directory: path.dirname(inv.destination),
    cd_label: "cidata",
    cd_content: { "meta-data": "", "user-data": userData },
  };

  const provisioners: Record<string, unknown>[] = [];

  if (inv.hasDependencies) {
    provisioners.push(
      { type: "shell", inline: [`mkdir -p ${STAGE_UPLOAD_DIR}`] },
      { type: "file", source: `${inv.stageRoot}/`, destination: STAGE_UPLOAD_DIR },
      { type: "shell", inline: [`sudo cp -a ${STAGE_UPLOAD_DIR}/. /`, `rm -rf ${STAGE_UPLOAD_DIR}`] },
    );
  }

  if (inv.devKeyPath !== null) {
    provisioners.push(
      { type: "file", source: inv.devKeyPath, destination: DEV_KEY_UPLOAD_PATH },
      {
        type: "shell",
        inline: [
          "mkdir -p ~/.ssh",
          `cat ${DEV_KEY_UPLOAD_PATH} >> ~/.ssh/authorized_keys`,
          "chmod 600 ~/.ssh/authorized_keys",
          `rm -f ${DEV_KEY_UPLOAD_PATH}`,
        ],
      },
    );
  }

  if (inv.scriptPath !== null) {
    provisioners.push({
      type: "shell",
      script: inv.scriptPath,
      environment_vars: [
        ...parameters.envNames.map((name) => `${name}={{user \`${name}\`}}`),
        `GENESIS_VERSION=${inv.version}`,
        `GENESIS_IMAGE=${inv.image}`,
      ],
      execute_command: "chmod +x {{ .Path }}; {{ .Vars }} sudo -E {{ .Path }}",
    });
  }

  return { variables, builders: [builder], provisioners };
}

/**
 * Runs `packer build` for each image in the invocation's work directory.
 */
export class PackerBuilder implements ImageBuilder {
  readonly name = "packer";

  constructor(private readonly command: string = "packer") {}

  async build(inv: BuildInvocation, control: BuildControl): Promise<BuilderOutcome> {
    fs.mkdirSync(inv.workDir, { recursive: true });
    const templatePath = path.join(inv.workDir, TEMPLATE_FILE);
    fs.writeFileSync(templatePath, JSON.stringify(renderPackerTemplate(inv), null, 2) + "\n", "utf8");

    try {
      const { stdout, stderr } = await pExecFile(this.command, ["build", "-force", "-color=false", templatePath], {
        cwd: inv.workDir,
        env: { ...inv.env, ...inv.parameters.env },
        signal: control.signal,
        timeout: control.timeoutMs ?? 0,
        maxBuffer: MAX_OUTPUT_BYTES,
      });
      return { exitCode: 0, signal: null, timedOut: false, output: stdout + stderr };
    } catch (e) {
      if (control.signal?.aborted) throw e;
      return execFailureOutcome(e, control.timeoutMs ?? 0);
    }
  }
}

/**
 * Map an `execFile` rejection to an outcome. Rethrows when the builder
 * never ran (ENOENT and friends).
 */
export function execFailureOutcome(e: unknown, timeoutMs: number): BuilderOutcome {
  if (!isExecFailure(e)) throw e;
  const output = (e.stdout ?? "") + (e.stderr ?? "");
  const signal = e.signal ?? null;

  // Killed by execFile itself, not by a timeout.
  if (e.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
    return { exitCode: null, signal, timedOut: false, output, failure: "builder output exceeded the capture limit" };
  }
  if (typeof e.code !== "number" && !e.killed) throw e;
  return {
    exitCode: typeof e.code === "number" ? e.code : null,
    signal,
    timedOut: e.killed === true && timeoutMs > 0,
    output,
  };
}
