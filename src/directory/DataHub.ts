import { readTable, readWorkbook } from '../source/TableSource.ts';
import { createLogger } from '../utils/Logger.ts';
import { AbaDirectory } from './AbaDirectory.ts';
import { AddressDirectory } from './AddressDirectory.ts';
import { IncidentMatrix } from './IncidentMatrix.ts';
import { PostcodeDirectory } from './PostcodeDirectory.ts';
import { TaskMap } from './TaskMap.ts';

import type { SourceConfig } from '../config/SourceConfig.ts';
import type { Table, Workbook } from '../model/Models.ts';

const logger = createLogger('DataHub');

/**
 * The raw reference data, one entry per source
 */
export interface HubSources {
    postcodes: Table;
    addresses: Table;
    aba: Table;
    incidents: Workbook;
    taskIds: Table;
}

export interface HubDirectories {
    postcodes: PostcodeDirectory;
    addresses: AddressDirectory;
    aba: AbaDirectory;
    incidents: IncidentMatrix;
    taskMap: TaskMap;
}

/**
 * Loads a complete, fresh set of directories. Postcodes go first so the
 * address directory can attach city names.
 */
export function loadDirectories(sources: HubSources): HubDirectories {
    const postcodes = new PostcodeDirectory();
    postcodes.load(sources.postcodes);

    const addresses = new AddressDirectory();
    addresses.load(sources.addresses, postcodes.asMap());

    const aba = new AbaDirectory();
    aba.load(sources.aba);

    const incidents = new IncidentMatrix();
    incidents.load(sources.incidents);

    const taskMap = new TaskMap();
    taskMap.load(sources.taskIds);

    return { postcodes, addresses, aba, incidents, taskMap };
}

/**
 * Reads the five reference files named in the configuration.
 */
export async function readHubSources(config: SourceConfig): Promise<HubSources> {
    const [postcodes, addresses, aba, incidents, taskIds] = await Promise.all([
        readTable(config.files.postcodes),
        readTable(config.files.addresses),
        readTable(config.files.aba),
        readWorkbook(config.files.incidents),
        readTable(config.files.taskIds),
    ]);
    return { postcodes, addresses, aba, incidents, taskIds };
}

/**
 * Owns every directory. A reload builds a whole new set and swaps it in
 * only once all of them loaded, so readers never see a mix of old and new.
 */
export class DataHub {
    private directories: HubDirectories;

    constructor(directories: HubDirectories) {
        this.directories = directories;
    }

    static load(sources: HubSources): DataHub {
        const hub = new DataHub(loadDirectories(sources));
        logger.info('Reference data loaded');
        return hub;
    }

    static async fromConfig(config: SourceConfig): Promise<DataHub> {
        logger.info(`Loading reference data from ${config.dataDir}`);
        return DataHub.load(await readHubSources(config));
    }

    reload(sources: HubSources): void {
        this.directories = loadDirectories(sources);
        logger.info('Reference data reloaded');
    }

    async reloadFromConfig(config: SourceConfig): Promise<void> {
        this.reload(await readHubSources(config));
    }

    get postcodes(): PostcodeDirectory {
        return this.directories.postcodes;
    }

    get addresses(): AddressDirectory {
        return this.directories.addresses;
    }

    get aba(): AbaDirectory {
        return this.directories.aba;
    }

    get incidents(): IncidentMatrix {
        return this.directories.incidents;
    }

    get taskMap(): TaskMap {
        return this.directories.taskMap;
    }
}
