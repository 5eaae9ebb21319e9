/**
 * Repository Explorer
 * Discovers a repository's services and architecture: README, directory
 * layout and project files feed an LLM service identification, each service
 * is classified from its project and entry-point files, and one architecture
 * call summarizes the whole. Every LLM step has a deterministic fallback, so
 * explore() always resolves.
 */

import { GitHubTools } from '../clients/github-tools.js';
import { TextGenerator } from '../clients/text-generator.js';
import { createLogger } from '../shared/index.js';
import {
  ArchitectureAnalysis,
  ArchitecturePatterns,
  DirectoryEntry,
  FileRef,
  MetadataFileCategory,
  MetadataFileInfo,
  RepositoryExplorerResult,
  RepositoryMetadata,
  RepositoryRef,
  Service,
  ServiceConnection,
  ServiceKind,
} from '../types/index.js';
import {
  parseDirectoryListing,
  parseSearchResults,
  parseWorkflowListing,
  readFileText,
  truncateText,
} from '../utils/extractors.js';
import { JsonShape, asString, asStringArray, isRecord, stringArrayShape } from '../utils/json-response.js';
import { ProgressReporter, silentProgress } from './progress-reporter.js';
import { generateStructured } from './structured-generation.js';

const log = createLogger('RepositoryExplorer');

export const NO_README = 'No README available';
export const SERVICE_INFO_UNAVAILABLE = 'Service information not available';
export const ANALYSIS_UNAVAILABLE = 'Analysis not available';

const SERVICE_NAME_KEYWORDS = ['api', 'service', 'app', 'web', 'client'];
const PREVIEW_LENGTH = 200;

/**
 * Where a service's files live and which names look like executables.
 * The defaults describe a .NET solution laid out under src/.
 */
export interface ProjectConventions {
  /** Code search query locating project files */
  projectFileQuery: string;
  searchPerPage: number;
  projectFilePath(service: string): string;
  entryPointPath(service: string): string;
  /** Lower-case name fragments that mark a service as runnable */
  executableKeywords: string[];
}

export const DEFAULT_PROJECT_CONVENTIONS: ProjectConventions = {
  projectFileQuery: 'extension:csproj',
  searchPerPage: 30,
  projectFilePath: (service) => `src/${service}/${service}.csproj`,
  entryPointPath: (service) => `src/${service}/Program.cs`,
  executableKeywords: ['.api', 'app', 'processor', 'client', 'web'],
};

/** Probed in order; the first path found wins */
export const METADATA_FILE_PATHS: Record<MetadataFileCategory, string[]> = {
  license: ['LICENSE', 'LICENSE.md', 'LICENSE.txt'],
  contributing: ['CONTRIBUTING.md', 'CONTRIBUTING', '.github/CONTRIBUTING.md'],
  code_of_conduct: ['CODE_OF_CONDUCT.md', '.github/CODE_OF_CONDUCT.md'],
  security: ['SECURITY.md', '.github/SECURITY.md'],
  changelog: ['CHANGELOG.md', 'CHANGELOG', 'HISTORY.md'],
};

export const TEST_DIRECTORIES = ['tests', 'test', 'Tests', 'Test'];

export interface RepositoryExplorerOptions {
  progress?: ProgressReporter;
  conventions?: ProjectConventions;
}

// ============================================
// Reply shapes
// ============================================

const SERVICE_KINDS: ServiceKind[] = ['api', 'webapp', 'library', 'service', 'unknown'];

function isServiceKind(value: unknown): value is ServiceKind {
  return SERVICE_KINDS.some((kind) => kind === value);
}

function portOf(value: unknown): string | null {
  if (typeof value === 'string' && value && value.toLowerCase() !== 'null') {
    return value;
  }
  return typeof value === 'number' ? String(value) : null;
}

/**
 * Service classification reply; the model names the kind under `type`
 */
export function serviceShape(serviceName: string): JsonShape<Service> {
  return (value) => {
    if (!isRecord(value)) {
      return null;
    }
    return {
      name: asString(value.name) || serviceName,
      description: asString(value.description) ?? '',
      technologies: asStringArray(value.technologies),
      dependencies: asStringArray(value.dependencies),
      kind: isServiceKind(value.type) ? value.type : 'unknown',
      port: portOf(value.port),
    };
  };
}

function connectionsOf(value: unknown): ServiceConnection[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const connections: ServiceConnection[] = [];
  for (const entry of value) {
    if (!isRecord(entry)) {
      continue;
    }
    const from = asString(entry.from);
    const to = asString(entry.to);
    if (from !== null && to !== null) {
      connections.push({ from, to, method: asString(entry.method) ?? '' });
    }
  }
  return connections;
}

function patternsOf(value: unknown): ArchitecturePatterns {
  if (!isRecord(value)) {
    return {};
  }
  const patterns: ArchitecturePatterns = {};
  if (Array.isArray(value.shared_technologies)) {
    patterns.shared_technologies = asStringArray(value.shared_technologies);
  }
  if (Array.isArray(value.communication_styles)) {
    patterns.communication_styles = asStringArray(value.communication_styles);
  }
  const style = asString(value.architecture_pattern);
  if (style !== null) {
    patterns.architecture_pattern = style;
  }
  return patterns;
}

export const architectureShape: JsonShape<ArchitectureAnalysis> = (value) => {
  if (!isRecord(value)) {
    return null;
  }
  return {
    overview: asString(value.overview) ?? '',
    connections: connectionsOf(value.connections),
    patterns: patternsOf(value.patterns),
    tech_stack: asStringArray(value.tech_stack),
  };
};

/**
 * Directory names that look like services, used when the model gives no answer
 */
export function fallbackServiceNames(directories: DirectoryEntry[]): string[] {
  return directories
    .map((dir) => dir.name)
    .filter((name) => SERVICE_NAME_KEYWORDS.some((keyword) => name.toLowerCase().includes(keyword)));
}

export function unavailableService(name: string): Service {
  return {
    name,
    description: SERVICE_INFO_UNAVAILABLE,
    technologies: [],
    dependencies: [],
    kind: 'unknown',
    port: null,
  };
}

export function unavailableArchitecture(): ArchitectureAnalysis {
  return { overview: ANALYSIS_UNAVAILABLE, connections: [], patterns: {}, tech_stack: [] };
}

// ============================================
// Explorer
// ============================================

export class RepositoryExplorer {
  private progress: ProgressReporter;
  private conventions: ProjectConventions;

  constructor(
    private readonly github: GitHubTools,
    private readonly generator: TextGenerator,
    private readonly repository: RepositoryRef,
    options: RepositoryExplorerOptions = {}
  ) {
    this.progress = options.progress ?? silentProgress;
    this.conventions = options.conventions ?? DEFAULT_PROJECT_CONVENTIONS;
  }

  /**
   * Explore the repository structure; never rejects
   */
  async explore(): Promise<RepositoryExplorerResult> {
    const { owner, name } = this.repository;
    this.progress.step(`🔍 Exploring Repository: ${owner}/${name}`);

    this.progress.step('📖 Step 1: Fetching README...');
    const readme = await this.fetchReadme();

    this.progress.step('📁 Step 2: Exploring src/ directory...');
    const directories = await this.listDirectories();
    this.progress.info(`✅ Found ${directories.length} directories`);

    this.progress.step('🔎 Step 3: Searching for project files...');
    const projectFiles = parseSearchResults(
      await this.github.searchCode(owner, name, this.conventions.projectFileQuery, this.conventions.searchPerPage)
    );
    this.progress.info(`✅ Found ${projectFiles.length} project files`);

    this.progress.step('🤖 Step 4: Analyzing with LLM to identify services...');
    const serviceNames = await this.identifyServices(readme, directories, projectFiles);

    this.progress.step(`📊 Step 5: Fetching details for ${serviceNames.length} services...`);
    const services = await this.getServiceDetails(serviceNames);

    this.progress.step('🔗 Step 6: Analyzing service connections...');
    const architecture = await this.analyzeArchitecture(readme, services);

    this.progress.step('📚 Step 7: Extracting repository metadata...');
    const metadata = await this.extractRepositoryMetadata();

    this.progress.step('✅ Repository exploration complete!');
    this.progress.info(`Services: ${services.length}`);
    this.progress.info(`Connections: ${architecture.connections.length}`);

    return {
      repository: { owner, name, url: `https://github.com/${owner}/${name}` },
      overview: architecture.overview,
      metadata,
      services,
      connections: architecture.connections,
      patterns: architecture.patterns,
      tech_stack: architecture.tech_stack,
    };
  }

  private async fetchReadme(): Promise<string> {
    const { owner, name } = this.repository;
    const readme = readFileText(await this.github.getFileContents(owner, name, 'README.md'));
    if (!readme) {
      this.progress.warn('No README found');
      return NO_README;
    }
    this.progress.info(`✅ README fetched (${readme.length} chars)`);
    return readme;
  }

  private async listDirectories(): Promise<DirectoryEntry[]> {
    const { owner, name } = this.repository;
    let listing = await this.github.getFileContents(owner, name, 'src');
    if (!listing) {
      this.progress.warn('No src/ directory, trying root...');
      listing = await this.github.getFileContents(owner, name, '');
    }
    return parseDirectoryListing(listing);
  }

  /**
   * Ask the model for the service names; fall back to keyword-matching directories
   */
  async identifyServices(readme: string, directories: DirectoryEntry[], projectFiles: FileRef[]): Promise<string[]> {
    const prompt = `You are analyzing a GitHub repository to identify services/applications.

README Content (first 3000 chars):
${truncateText(readme, 3000)}

Directories found:
${JSON.stringify(directories.slice(0, 20), null, 2)}

Project files found:
${JSON.stringify(projectFiles.slice(0, 20), null, 2)}

Based on this information, identify ALL services/applications in this repository.
Look for:
- API services (e.g., Catalog.API, Basket.API)
- Web applications (e.g., WebApp, ClientApp)
- Background services
- Infrastructure/shared libraries (e.g., EventBus, ServiceDefaults)

Return ONLY a JSON array of service names (directory/folder names):
["Service1", "Service2", "Service3"]`;

    const names = await generateStructured(this.generator, {
      systemPrompt: 'You are a repository analysis expert. Return only valid JSON.',
      prompt,
      shape: stringArrayShape,
      purpose: 'service identification',
    }, log);
    if (names) {
      return names;
    }
    return fallbackServiceNames(directories);
  }

  /**
   * Fetch and classify each service in turn
   */
  async getServiceDetails(serviceNames: string[]): Promise<Service[]> {
    const { owner, name } = this.repository;
    const services: Service[] = [];

    for (const service of serviceNames) {
      const projectFile = readFileText(
        await this.github.getFileContents(owner, name, this.conventions.projectFilePath(service), { silent: true })
      );

      let entryPoint: string | null = null;
      const lowered = service.toLowerCase();
      if (projectFile || this.conventions.executableKeywords.some((keyword) => lowered.includes(keyword))) {
        entryPoint = readFileText(
          await this.github.getFileContents(owner, name, this.conventions.entryPointPath(service), { silent: true })
        );
      }

      if (projectFile || entryPoint) {
        this.progress.info(`• Analyzing ${service}... ✓`);
      } else {
        this.progress.info(`• Analyzing ${service}... ⚠ (minimal metadata)`);
      }

      services.push(await this.analyzeService(service, projectFile ?? '', entryPoint ?? ''));
    }

    return services;
  }

  /**
   * Classify one service from its project and entry-point files
   */
  async analyzeService(service: string, projectFile: string, entryPoint: string): Promise<Service> {
    const prompt = `Analyze this service and extract information:

Service Name: ${service}

Project File (.csproj):
${projectFile ? truncateText(projectFile, 2000) : 'Not available'}

Program.cs:
${entryPoint ? truncateText(entryPoint, 2000) : 'Not available'}

Extract and return JSON with:
{
  "name": "service name",
  "description": "what this service does (concrete, specific)",
  "technologies": ["tech1", "tech2"],
  "dependencies": ["dependency1", "dependency2"],
  "type": "api|webapp|library|service",
  "port": "port number if found or null"
}`;

    const info = await generateStructured(this.generator, {
      systemPrompt: 'You are a code analysis expert. Return only valid JSON.',
      prompt,
      shape: serviceShape(service),
      purpose: `classification of ${service}`,
    }, log);
    return info ?? unavailableService(service);
  }

  /**
   * Summarize the architecture across all services
   */
  async analyzeArchitecture(readme: string, services: Service[]): Promise<ArchitectureAnalysis> {
    const prompt = `Analyze this repository's architecture:

README:
${truncateText(readme, 4000)}

Services:
${JSON.stringify(services, null, 2)}

Provide JSON with:
{
  "overview": "brief description of the repository",
  "connections": [
    {"from": "ServiceA", "to": "ServiceB", "method": "REST|gRPC|Events"}
  ],
  "patterns": {
    "shared_technologies": ["tech1", "tech2"],
    "communication_styles": ["REST", "Events"],
    "architecture_pattern": "microservices|monolith|modular"
  },
  "tech_stack": ["primary technologies used"]
}`;

    const analysis = await generateStructured(this.generator, {
      systemPrompt: 'You are an architecture analysis expert. Return only valid JSON.',
      prompt,
      shape: architectureShape,
      purpose: 'architecture analysis',
    }, log);
    return analysis ?? unavailableArchitecture();
  }

  /**
   * Probe the conventional metadata files and directories
   */
  async extractRepositoryMetadata(): Promise<RepositoryMetadata> {
    const license = await this.probeMetadataFile('license');
    const contributing = await this.probeMetadataFile('contributing');
    const codeOfConduct = await this.probeMetadataFile('code_of_conduct');
    const security = await this.probeMetadataFile('security');
    const changelog = await this.probeMetadataFile('changelog');

    const workflows = parseWorkflowListing(await this.probe('.github/workflows'));
    const dockerfile = await this.probe('Dockerfile');
    const dockerCompose = await this.probe('docker-compose.yml');
    const docs = await this.probe('docs');

    let hasTestDirectory = false;
    for (const dir of TEST_DIRECTORIES) {
      if (await this.probe(dir)) {
        hasTestDirectory = true;
        break;
      }
    }

    return {
      license,
      contributing,
      code_of_conduct: codeOfConduct,
      security,
      changelog,
      ci_cd_workflows: workflows,
      docker_support: {
        dockerfile: dockerfile !== null,
        docker_compose: dockerCompose !== null,
      },
      documentation: { has_docs_folder: docs !== null },
      testing: { has_test_directory: hasTestDirectory },
    };
  }

  private async probeMetadataFile(category: MetadataFileCategory): Promise<MetadataFileInfo> {
    for (const path of METADATA_FILE_PATHS[category]) {
      const content = readFileText(await this.probe(path));
      if (content) {
        return { exists: true, path, content_preview: truncateText(content, PREVIEW_LENGTH) };
      }
    }
    return { exists: false };
  }

  private probe(path: string): Promise<string | null> {
    return this.github.getFileContents(this.repository.owner, this.repository.name, path, { silent: true });
  }
}
