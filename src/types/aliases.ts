// SPDX-License-Identifier: Apache-2.0

import {type Argv} from 'yargs';

// eslint-disable-next-line @typescript-eslint/no-empty-object-type
export type AnyYargs = Argv<{}>;

export type ArgvStruct = {_: (string | number)[]} & Record<string, unknown>;

export type Path = string;
export type DirectoryPath = string;
