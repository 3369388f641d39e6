/**
 * @fileoverview VBA Project Handling
 * Detects the VBA project of a macro-enabled template and puts it back into a
 * workbook package after the document engine has rewritten it.
 */

import JSZip from 'jszip';
import { VBA_PROJECT_PART } from './constants.js';
import { createLogger } from './logger.js';

const log = createLogger('Macros');

const CONTENT_TYPES_PART = '[Content_Types].xml';
const WORKBOOK_RELS_PART = 'xl/_rels/workbook.xml.rels';

const VBA_CONTENT_TYPE = 'application/vnd.ms-office.vbaProject';
const VBA_RELATIONSHIP_TYPE = 'http://schemas.microsoft.com/office/2006/relationships/vbaProject';
const WORKBOOK_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet.main+xml';
const MACRO_WORKBOOK_CONTENT_TYPE = 'application/vnd.ms-excel.sheet.macroEnabled.main+xml';

/**
 * Reads the VBA project part of a workbook package.
 *
 * @param bytes - .xlsx/.xlsm file contents
 * @returns The raw part, or null when the workbook has no macros
 */
export async function extractVbaProject(bytes: Uint8Array): Promise<Uint8Array | null> {
    const zip = await JSZip.loadAsync(bytes);
    const part = zip.file(VBA_PROJECT_PART);
    if (!part) return null;
    const vbaProject = await part.async('uint8array');
    log.debug(`Template carries a VBA project (${vbaProject.length} bytes)`);
    return vbaProject;
}

/**
 * Adds a `bin` default content type and switches the workbook part to the
 * macro-enabled content type.
 */
export function addVbaContentTypes(xml: string): string {
    let result = xml.replace(WORKBOOK_CONTENT_TYPE, MACRO_WORKBOOK_CONTENT_TYPE);
    if (!/<Default\s+Extension="bin"/.test(result)) {
        result = result.replace('</Types>', `<Default Extension="bin" ContentType="${VBA_CONTENT_TYPE}"/></Types>`);
    }
    return result;
}

/**
 * Adds the workbook → vbaProject.bin relationship unless one is present.
 */
export function addVbaRelationship(xml: string): string {
    if (xml.includes(VBA_RELATIONSHIP_TYPE)) return xml;
    let n = 1;
    while (xml.includes(`Id="rIdVba${n}"`)) n++;
    return xml.replace(
        '</Relationships>',
        `<Relationship Id="rIdVba${n}" Type="${VBA_RELATIONSHIP_TYPE}" Target="vbaProject.bin"/></Relationships>`
    );
}

/**
 * Writes a VBA project into a workbook package and registers it.
 *
 * @param workbook - Serialized .xlsx package
 * @param vbaProject - Raw VBA project part taken from the template
 * @returns The macro-enabled package
 */
export async function injectVbaProject(workbook: Uint8Array, vbaProject: Uint8Array): Promise<Buffer> {
    const zip = await JSZip.loadAsync(workbook);

    const contentTypes = await zip.file(CONTENT_TYPES_PART)?.async('string');
    const relationships = await zip.file(WORKBOOK_RELS_PART)?.async('string');
    if (contentTypes === undefined || relationships === undefined) {
        throw new Error('Workbook package is missing its content types or workbook relationships');
    }

    zip.file(VBA_PROJECT_PART, vbaProject);
    zip.file(CONTENT_TYPES_PART, addVbaContentTypes(contentTypes));
    zip.file(WORKBOOK_RELS_PART, addVbaRelationship(relationships));

    log.debug('Re-injected VBA project');
    return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}
