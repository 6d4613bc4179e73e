import * as moduleAlias from 'module-alias';

// Mirrors "paths" in tsconfig.json for the compiled output
moduleAlias.addAliases({
    '@cli': `${__dirname}/cli`,
    '@data-access': `${__dirname}/data-access`,
    '@environment': `${__dirname}/environment`,
    '@managers': `${__dirname}/managers`,
    '@presenter': `${__dirname}/presenter`,
    '@shared': `${__dirname}/shared`,
    '@utils': `${__dirname}/utils`,
});
