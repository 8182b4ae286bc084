import convict from "convict";
import yaml from "js-yaml";

convict.addParser({ extension: ["yml", "yaml"], parse: yaml.load });

/**
 * convict, able to load YAML files as well as JSON.
 */
export default convict;
