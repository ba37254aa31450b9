import { describe, it, expect } from 'vitest';
import { ConfigError, DEFAULT_FORM_PAGE_PATH, addTaskUrl, loadConfig } from './config';

const minimal = {
    TASKTRACKER_API_HOST_ADDRESS: 'http://localhost/',
    TASKTRACKER_API_PORT: '5000'
};

describe('loadConfig', () => {
    it('fills in defaults', () => {
        expect(loadConfig(minimal)).toEqual({
            environment: 'production',
            port: 8080,
            formPagePath: DEFAULT_FORM_PAGE_PATH,
            taskTracker: {
                hostAddress: 'http://localhost',
                port: 5000,
                addTaskPath: 'addTask'
            }
        });
    });

    it('reads every setting from the environment', () => {
        const config = loadConfig({
            ...minimal,
            APP_ENV: 'development',
            TASK_FORM_PORT: '3000',
            TASK_FORM_PAGE: '/srv/form.html',
            TASKTRACKER_ADD_TASK_PATH: '/api/tasks'
        });

        expect(config.environment).toBe('development');
        expect(config.port).toBe(3000);
        expect(config.formPagePath).toBe('/srv/form.html');
        expect(addTaskUrl(config)).toBe('http://localhost:5000/api/tasks');
    });

    it('builds the add task URL from host, port and path', () => {
        expect(addTaskUrl(loadConfig(minimal))).toBe('http://localhost:5000/addTask');
    });

    it('names every missing setting', () => {
        const error = (() => {
            try {
                loadConfig({});
            } catch (e) {
                return e;
            }
        })();

        expect(error).toBeInstanceOf(ConfigError);
        if (error instanceof ConfigError) {
            expect(error.issues).toEqual([
                'TASKTRACKER_API_HOST_ADDRESS: Required',
                'TASKTRACKER_API_PORT: Expected number, received nan'
            ]);
        }
    });

    it('rejects ports that are not numbers in range', () => {
        expect(() => loadConfig({ ...minimal, TASKTRACKER_API_PORT: 'http' })).toThrow(ConfigError);
        expect(() => loadConfig({ ...minimal, TASK_FORM_PORT: '70000' })).toThrow(ConfigError);
    });

    it('rejects a blank task tracker port instead of reading it as 0', () => {
        expect(() => loadConfig({ ...minimal, TASKTRACKER_API_PORT: '' })).toThrow(ConfigError);
        expect(() => loadConfig({ ...minimal, TASKTRACKER_API_PORT: '0' })).toThrow(ConfigError);
    });

    it('still lets the form server ask for an ephemeral port', () => {
        expect(loadConfig({ ...minimal, TASK_FORM_PORT: '0' }).port).toBe(0);
    });

    it('rejects an unknown environment', () => {
        expect(() => loadConfig({ ...minimal, APP_ENV: 'staging' })).toThrow(ConfigError);
    });
});
